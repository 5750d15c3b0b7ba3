// ============================================
// mdlive Server - Barrel Export
// ============================================

export {
  buildTree,
  createRoutes,
  type DirectoryEntry,
  type FileEntry,
  type FileMetadata,
  flattenTree,
  readTextFile,
} from "./handlers.js";
export { acceptLiveSocket, attachLiveSocketServer, LIVE_SOCKET_PATH, WebSocketTransport } from "./live-socket.js";
export {
  errorResponse,
  type HandlerResponse,
  type RequestContext,
  type ResolvedFile,
  resolveFile,
  type Route,
  Router,
  toPosixPath,
} from "./router.js";
export { PreviewServer, type PreviewServerOptions, type PreviewServerStatus } from "./server.js";
export { createServerState, type ServeMode, type ServerState } from "./state.js";
export { escapeHtml, LIVE_RELOAD_SCRIPT_PATH, renderFileList, renderPage } from "./template.js";
