/**
 * UTILITY FILE - NOT A TEST
 * This file contains helper utilities for testing
 */

import { Action, ActionKind, ActionParams } from '../../core/actions/types.js';
import { createAction } from '../../core/actions/action.js';
import { BrowserCapabilities, BrowserSession, ClickOptions, OpenPage, PageObservation } from '../../core/browser/types.js';
import { ActionDispatcher, ExecutionOutcome } from '../../core/executor/executor.js';
import { DecisionMaker } from '../../core/llm/llmProcessor.js';
import { Decision, DecisionInput } from '../../core/shared/types.js';
import { DecisionError } from '../../core/shared/errors.js';

export function makeObservation(overrides: Partial<PageObservation> = {}): PageObservation {
  return {
    url: 'https://example.com/',
    title: 'Example',
    markup: '<html><body>Example</body></html>',
    scriptText: '',
    visibleText: 'Example',
    screenshot: Buffer.from('png-bytes'),
    capturedAt: 0,
    ...overrides
  };
}

export function makePage(index: number, url: string, active = false): OpenPage {
  return { index, url, title: `Page ${index}`, active };
}

export function decision(kind: string, params: ActionParams = {}, thought = `do ${kind}`): Decision {
  return { thought, action: createAction(kind, params) };
}

type CapabilityName = keyof BrowserCapabilities | 'close';

/**
 * In-memory browser that records every primitive call in order
 */
export class FakeBrowser implements BrowserSession {
  readonly calls: string[] = [];
  pages: OpenPage[] = [makePage(0, 'https://example.com/', true)];
  /** Pages that appear after the next pointer click */
  opensOnClick: OpenPage[] = [];
  settles = true;
  listCount = 0;
  failures: Partial<Record<CapabilityName, Error>> = {};

  async capture(): Promise<PageObservation> {
    this.record('capture', 'capture');
    const active = this.pages.find(page => page.active);
    return makeObservation({ url: active?.url ?? 'about:blank' });
  }

  async navigate(url: string): Promise<void> {
    this.record('navigate', `navigate ${url}`);
  }

  async pointerClick(x: number, y: number, options: ClickOptions): Promise<void> {
    this.record('pointerClick', `click ${x},${y} ${options.button} x${options.clickCount}`);
    this.pages = [...this.pages, ...this.opensOnClick];
    this.opensOnClick = [];
  }

  async pointerMove(x: number, y: number): Promise<void> {
    this.record('pointerMove', `move ${x},${y}`);
  }

  async pointerDown(): Promise<void> {
    this.record('pointerDown', 'down');
  }

  async pointerUp(): Promise<void> {
    this.record('pointerUp', 'up');
  }

  async keyPress(name: string): Promise<void> {
    this.record('keyPress', `press ${name}`);
  }

  async keyType(text: string): Promise<void> {
    this.record('keyType', `type ${text}`);
  }

  async wheel(dx: number, dy: number): Promise<void> {
    this.record('wheel', `wheel ${dx},${dy}`);
  }

  async listOpenPages(): Promise<OpenPage[]> {
    this.listCount++;
    const failure = this.failures.listOpenPages;
    if (failure) throw failure;
    return this.pages.map(page => ({ ...page }));
  }

  async activatePage(index: number): Promise<void> {
    this.record('activatePage', `activate ${index}`);
    this.pages = this.pages.map(page => ({ ...page, active: page.index === index }));
  }

  async waitForLoadSignal(timeoutMs: number): Promise<boolean> {
    this.record('waitForLoadSignal', `settle ${timeoutMs}`);
    return this.settles;
  }

  async close(): Promise<void> {
    this.record('close', 'close');
  }

  private record(name: CapabilityName, call: string): void {
    this.calls.push(call);
    const failure = this.failures[name];
    if (failure) throw failure;
  }
}

type ScriptStep = Decision | Error | ((input: DecisionInput) => Promise<Decision>);

/**
 * Decision maker that replays a fixed script, one entry per call
 */
export class ScriptedDecider implements DecisionMaker {
  readonly inputs: DecisionInput[] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[]) {
    this.script = [...script];
  }

  async decide(input: DecisionInput): Promise<Decision> {
    this.inputs.push(input);
    const next = this.script.shift();
    if (next === undefined) {
      throw new DecisionError('Decision script exhausted');
    }
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next(input);
    return next;
  }
}

/**
 * Dispatcher that runs a handler per attempt; a throwing handler fails that attempt
 */
export class StubDispatcher implements ActionDispatcher {
  readonly attempts: ActionKind[] = [];
  refreshCount = 0;

  constructor(
    private readonly handler: (action: Action, attempt: number) => void = () => undefined,
    private readonly pages: OpenPage[] = [makePage(0, 'https://example.com/', true)]
  ) {}

  async execute(action: Action): Promise<ExecutionOutcome> {
    this.attempts.push(action.kind);
    this.handler(action, this.attempts.length);
    return { kind: action.kind, openPages: [...this.pages], openedPages: [] };
  }

  async refreshPages(): Promise<OpenPage[]> {
    this.refreshCount++;
    return [...this.pages];
  }
}
