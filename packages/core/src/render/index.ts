export { hashContent, RenderCache, type RenderCacheConfig } from "./cache.js";
export {
  MarkedRenderer,
  type MarkedRendererOptions,
  type Renderer,
  type RenderResult,
  slugify,
  stripInlineMarkdown,
  type TocEntry,
} from "./renderer.js";
