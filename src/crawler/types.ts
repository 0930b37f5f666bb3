/**
 * Types for page rendering and crawling
 */

export type ScriptRef =
  | { kind: 'inline'; content: string }
  | { kind: 'external'; src: string };

/**
 * Geometry of a visible form control as laid out in the rendered page
 */
export interface VisualElement {
  tag: string;
  inputType: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Viewport {
  width: number;
  height: number;
}

/**
 * What a PageDriver hands back for one URL
 */
export interface RenderedPage {
  /** Final URL after redirects */
  url: string;
  html: string;
  scripts: ScriptRef[];
  visualElements: VisualElement[];
  viewport: Viewport;
  screenshotPath: string | null;
}

export interface RenderOptions {
  /** Where to save a screenshot; omitted when screenshots are off */
  screenshotPath?: string;
}

/**
 * Renders a URL in a browser. Returns null when the page could not be loaded.
 */
export interface PageDriver {
  render(url: string, options?: RenderOptions): Promise<RenderedPage | null>;
}

/**
 * One crawled page, as consumed by the detector
 */
export interface PageSnapshot {
  url: string;
  html: string;
  scripts: ScriptRef[];
  /** Absolute links found on the page, in document order */
  links: string[];
  screenshotPath: string | null;
  visualElements: VisualElement[];
  viewport: Viewport;
  /** Remaining depth when the page was visited */
  depth: number;
  timestamp: string;
}

export interface CrawlOptions {
  maxLinksPerPage?: number; // default 10
  screenshotsDir?: string; // screenshots are taken only when set
}
