export { WebCrawler, DEFAULT_MAX_LINKS_PER_PAGE } from './crawler.js';
export { PlaywrightPageDriver, toScriptRefs } from './driver.js';
export type { DriverOptions, RawScript } from './driver.js';
export { extractLinks } from './links.js';
export type {
  ScriptRef,
  VisualElement,
  Viewport,
  RenderedPage,
  RenderOptions,
  PageDriver,
  PageSnapshot,
  CrawlOptions,
} from './types.js';
