import type { NavigationMilestone } from "../config";

export interface ObservedResponse {
  readonly url: string;
  readonly status: number;
  readonly contentType: string;
  body(): Promise<Buffer>;
}

export type SelectorState = "attached" | "visible";

export interface GotoOptions {
  waitUntil: NavigationMilestone;
  timeoutMs: number;
}

export interface TypeOptions {
  delayMs: number;
  timeoutMs: number;
}

/**
 * The slice of a browser tab the crawler drives. Selectors follow the
 * automation library's syntax, including `>> nth=<i>` suffixes.
 */
export interface BrowserPage {
  goto(url: string, options: GotoOptions): Promise<void>;
  /** Registers a response listener and returns its disposer. */
  onResponse(listener: (response: ObservedResponse) => void): () => void;
  /** Resolves false when the selector does not reach `state` within the timeout. */
  waitForSelector(selector: string, timeoutMs: number, state?: SelectorState): Promise<boolean>;
  isVisible(selector: string): Promise<boolean>;
  click(selector: string, timeoutMs: number): Promise<void>;
  typeText(selector: string, text: string, options: TypeOptions): Promise<void>;
  /** Outer HTML of the first match, the whole document when no selector is given, null when absent. */
  html(selector?: string): Promise<string | null>;
  bodyText(): Promise<string>;
  currentUrl(): string;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserSession>;
}
