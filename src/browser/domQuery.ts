export type ElementState = 'present' | 'clickable';

export interface FindOptions {
  timeoutMs: number;
  pollMs?: number;
  /** Defaults to `present`: attached to the document, visible or not. */
  state?: ElementState;
}

export interface ElementRef {
  click(): Promise<void>;
  /** Replaces the field's current value. */
  fill(text: string): Promise<void>;
  isChecked(): Promise<boolean>;
}

export type LoadState = 'interactive' | 'complete';

/**
 * The slice of a browser page the automation flows use. Waits report absence as `null` or
 * `false` instead of throwing, so optional page elements are handled with plain conditionals.
 */
export interface DomQuery {
  tryFind(selector: string, options: FindOptions): Promise<ElementRef | null>;
  /** Resolves true once no element matching the selector is displayed. */
  waitUntilGone(selector: string, options: FindOptions): Promise<boolean>;
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<boolean>;
  goto(url: string): Promise<void>;
  /** Reads the URL through the live page; throws when the browser is gone. */
  currentUrl(): Promise<string>;
  pause(ms: number): Promise<void>;
}

export interface BrowserHandle {
  dom: DomQuery;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserHandle>;
}
