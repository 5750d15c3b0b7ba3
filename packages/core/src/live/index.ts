export {
  type ClientMessage,
  ClientMessageSchema,
  encodeLiveMessage,
  type ErrorMessage,
  errorMessage,
  type LiveMessage,
  parseClientMessage,
  type PongMessage,
  type ReloadMessage,
  reloadMessage,
} from "./messages.js";
export {
  type BroadcastResult,
  type Connection,
  ConnectionRegistry,
  type ConnectionRegistryOptions,
  type LiveTransport,
  type SweepResult,
} from "./registry.js";
