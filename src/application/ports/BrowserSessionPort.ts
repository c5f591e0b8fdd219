export interface Locator {
  kind: 'css' | 'xpath';
  value: string;
}

export interface PageElement {
  clear(): Promise<void>;
  type(text: string): Promise<void>;
  scrollIntoView(): Promise<void>;
  click(): Promise<void>;
}

export type LocateResult = { found: true; element: PageElement } | { found: false; reason: string };

export interface BrowserSession {
  goto(url: string): Promise<void>;
  locate(locator: Locator, options: { timeoutMs: number; clickable?: boolean }): Promise<LocateResult>;
  title(): Promise<string>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserSessionPort {
  open(): Promise<BrowserSession>;
}
