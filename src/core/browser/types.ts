// src/core/browser/types.ts

/**
 * Everything the agent learns about the active page in one observation.
 */
export interface PageObservation {
  url: string;
  title: string;
  markup: string;
  scriptText: string;
  visibleText: string;
  screenshot: Buffer;
  capturedAt: number;
}

export interface OpenPage {
  index: number;
  url: string;
  title: string;
  active: boolean;
}

export type MouseButton = 'left' | 'right' | 'middle';

export interface ClickOptions {
  button: MouseButton;
  clickCount: number;
}

/**
 * Primitive browser operations the executor and loop rely on.
 */
export interface BrowserCapabilities {
  capture(): Promise<PageObservation>;
  navigate(url: string): Promise<void>;
  pointerClick(x: number, y: number, options: ClickOptions): Promise<void>;
  pointerMove(x: number, y: number): Promise<void>;
  pointerDown(): Promise<void>;
  pointerUp(): Promise<void>;
  keyPress(name: string): Promise<void>;
  keyType(text: string): Promise<void>;
  wheel(dx: number, dy: number): Promise<void>;
  listOpenPages(): Promise<OpenPage[]>;
  activatePage(index: number): Promise<void>;
  /** Resolves false when the page did not settle within the timeout. */
  waitForLoadSignal(timeoutMs: number): Promise<boolean>;
}

/**
 * A browser session the runner owns and must release.
 */
export interface BrowserSession extends BrowserCapabilities {
  close(): Promise<void>;
}
