import { Action, ActionKind, SwitchTabAction } from '../actions/types.js';
import { MARKER_KINDS, centerOf, describeAction, parseTypedText } from '../actions/action.js';
import { BrowserCapabilities, ClickOptions, OpenPage } from '../browser/types.js';
import { ActionExecutionError, OutOfRangeError } from '../shared/errors.js';
import { Logger } from '../../utils/logger.js';
import { sleep } from '../../utils/timing.js';

export const DEFAULT_SETTLE_TIMEOUT_MS = 3000;
export const DEFAULT_TAB_LOAD_TIMEOUT_MS = 5000;
export const DEFAULT_WAIT_ACTION_MS = 2000;

export interface ExecutorOptions {
  /** Bound on the DOM-settle wait after clicks, hotkeys and submitted text */
  settleTimeoutMs: number;
  /** Bound on the load wait after switching tabs */
  tabLoadTimeoutMs: number;
  /** How long a `wait` action sleeps */
  waitActionMs: number;
}

export interface ExecutionOutcome {
  kind: ActionKind;
  /** Open pages after the action, in the order they were opened */
  openPages: OpenPage[];
  /** Pages that appeared while the action ran (popups, target=_blank links) */
  openedPages: OpenPage[];
}

/**
 * What the loop needs from an executor. Tests substitute their own.
 */
export interface ActionDispatcher {
  execute(action: Action): Promise<ExecutionOutcome>;
  refreshPages(): Promise<OpenPage[]>;
}

const CLICK_OPTIONS: Record<'click' | 'double_click' | 'right_click', ClickOptions> = {
  click: { button: 'left', clickCount: 1 },
  double_click: { button: 'left', clickCount: 2 },
  right_click: { button: 'right', clickCount: 1 }
};

// Kinds that can open a tab as a side effect
const INTERACTIVE_KINDS: ReadonlySet<ActionKind> = new Set<ActionKind>([
  'click',
  'double_click',
  'right_click',
  'drag',
  'hotkey',
  'type',
  'scroll'
]);

export class ActionExecutor implements ActionDispatcher {
  private readonly options: ExecutorOptions;
  private knownPages: OpenPage[] = [];

  constructor(
    private readonly browser: BrowserCapabilities,
    private readonly logger: Logger,
    options: Partial<ExecutorOptions> = {}
  ) {
    this.options = {
      settleTimeoutMs: options.settleTimeoutMs ?? DEFAULT_SETTLE_TIMEOUT_MS,
      tabLoadTimeoutMs: options.tabLoadTimeoutMs ?? DEFAULT_TAB_LOAD_TIMEOUT_MS,
      waitActionMs: options.waitActionMs ?? DEFAULT_WAIT_ACTION_MS
    };
  }

  async execute(action: Action): Promise<ExecutionOutcome> {
    if (MARKER_KINDS.has(action.kind)) {
      this.logger.debug(`Marker action ${action.kind} has no browser effect`);
      return { kind: action.kind, openPages: [...this.knownPages], openedPages: [] };
    }

    this.logger.browser.action(action.kind, describeAction(action));

    try {
      const before = INTERACTIVE_KINDS.has(action.kind) ? await this.safeListPages() : null;

      await this.dispatch(action);

      if (action.kind === 'wait') {
        return { kind: action.kind, openPages: [...this.knownPages], openedPages: [] };
      }

      const after = await this.safeListPages();
      if (after) this.knownPages = after;

      const openedPages = before && after && after.length > before.length
        ? after.slice(before.length)
        : [];
      if (openedPages.length > 0) {
        this.logger.info(`Action ${action.kind} opened ${openedPages.length} new tab(s)`, {
          opened: openedPages.map(p => ({ index: p.index, url: p.url })),
          totalTabs: this.knownPages.length
        });
      }

      return { kind: action.kind, openPages: [...this.knownPages], openedPages };
    } catch (error) {
      if (error instanceof ActionExecutionError) {
        this.logger.browser.error(action.kind, error.message);
        throw error;
      }
      this.logger.browser.error(action.kind, error);
      throw new ActionExecutionError(action.kind, error);
    }
  }

  async refreshPages(): Promise<OpenPage[]> {
    this.knownPages = await this.browser.listOpenPages();
    this.logger.debug('Refreshed open page list', { count: this.knownPages.length });
    return [...this.knownPages];
  }

  private async dispatch(action: Action): Promise<void> {
    switch (action.kind) {
      case 'click':
      case 'double_click':
      case 'right_click': {
        const [x, y] = centerOf(action.startRegion);
        await this.browser.pointerClick(x, y, CLICK_OPTIONS[action.kind]);
        await this.settle(action.kind, this.options.settleTimeoutMs);
        return;
      }
      case 'drag': {
        const [startX, startY] = centerOf(action.startRegion);
        const [endX, endY] = centerOf(action.endRegion);
        await this.browser.pointerMove(startX, startY);
        await this.browser.pointerDown();
        await this.browser.pointerMove(endX, endY);
        await this.browser.pointerUp();
        return;
      }
      case 'hotkey':
        await this.browser.keyPress(action.keyName);
        await this.settle(action.kind, this.options.settleTimeoutMs);
        return;
      case 'type': {
        const { content, submitAfter } = parseTypedText(action);
        await this.browser.keyType(content);
        if (submitAfter) {
          await this.browser.keyPress('Enter');
          await this.settle(action.kind, this.options.settleTimeoutMs);
        }
        return;
      }
      case 'scroll': {
        const [x, y] = centerOf(action.startRegion);
        await this.browser.pointerMove(x, y);
        await this.browser.wheel(action.scrollDelta[0], action.scrollDelta[1]);
        return;
      }
      case 'wait':
        await sleep(this.options.waitActionMs);
        return;
      case 'switch_tab':
        await this.switchTab(action);
        return;
      case 'finished':
      case 'call_user':
      case 'start':
        return;
    }
  }

  private async switchTab(action: SwitchTabAction): Promise<void> {
    const pages = await this.refreshPages();
    const index = action.tabIndex ?? pages.length - 1;

    if (index < 0 || index >= pages.length) {
      throw new OutOfRangeError(index, pages.length);
    }

    await this.browser.activatePage(index);
    await this.settle('switch_tab', this.options.tabLoadTimeoutMs);

    this.logger.info(`Switched to tab #${index}`, { url: pages[index]?.url });
  }

  // A page that never settles is not a failed action
  private async settle(kind: ActionKind, timeoutMs: number): Promise<void> {
    try {
      const settled = await this.browser.waitForLoadSignal(timeoutMs);
      if (!settled) {
        this.logger.warn(`Page did not settle within ${timeoutMs}ms after ${kind}; continuing`);
      }
    } catch (error) {
      this.logger.warn(`Waiting for the page to settle after ${kind} failed; continuing`, error);
    }
  }

  private async safeListPages(): Promise<OpenPage[] | null> {
    try {
      return await this.browser.listOpenPages();
    } catch (error) {
      this.logger.warn('Could not list open pages', error);
      return null;
    }
  }
}
