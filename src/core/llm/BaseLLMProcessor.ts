import { DecisionMaker } from "./llmProcessor.js";
import { Decision, DecisionInput, HistoryEntry } from "../shared/types.js";
import { OpenPage } from "../browser/types.js";
import { ActionExtractor } from '../actions/extractor.js';
import { describeAction, fromRecord } from '../actions/action.js';
import { DecisionError, describeCause } from '../shared/errors.js';
import { Logger } from '../../utils/logger.js';

export const DEFAULT_HISTORY_WINDOW = 10;
export const VISIBLE_TEXT_LIMIT = 4000;

export interface VisionPrompt {
  systemPrompt: string;
  prompt: string;
  /** Viewport screenshot, PNG, base64 without a data: prefix */
  screenshotBase64: string;
}

/**
 * Abstract base class for vision processors: builds the prompt, hands it to the
 * provider with the screenshot and turns the reply into a Decision.
 */
export abstract class BaseLLMProcessor implements DecisionMaker {
  protected static readonly SYSTEM_PROMPT = `
### You are an automation agent controlling a web browser through screenshots.
### Each turn you receive a screenshot of the current viewport, the user's task and the steps taken so far.
### Reply with exactly ONE JSON object and nothing else:
{ "Thought": "what you see and why you choose the next action", "Action": "<kind>", "Parameters": { ... } }

# ACTIONS
Coordinates are viewport pixels. A box is [x1, y1, x2, y2]; the agent acts on its center.
- click:        { "Action": "click", "Parameters": { "start_box": [x1, y1, x2, y2] } }
- double_click: { "Action": "double_click", "Parameters": { "start_box": [x1, y1, x2, y2] } }
- right_click:  { "Action": "right_click", "Parameters": { "start_box": [x1, y1, x2, y2] } }
- drag:         { "Action": "drag", "Parameters": { "start_box": [...], "end_box": [...] } }
- scroll:       { "Action": "scroll", "Parameters": { "start_box": [...], "deltas": [dx, dy] } }  (positive dy scrolls down)
- type:         { "Action": "type", "Parameters": { "content": "text" } }  (end the text with \\n to press Enter afterwards)
- hotkey:       { "Action": "hotkey", "Parameters": { "key": "Enter" } }  (Playwright key names, e.g. "Control+A")
- wait:         { "Action": "wait" }  (the page is still loading)
- switch_tab:   { "Action": "switch_tab", "Parameters": { "tab_index": 1 } }  (omit tab_index for the newest tab)
- call_user:    { "Action": "call_user", "Parameters": { "question": "what you need from the human" } }
- finished:     { "Action": "finished" }  (the task is complete)

# GUIDELINES
- Click an input field before typing into it.
- Links often open in a new tab. When OPEN TABS lists a tab you have not looked at, switch to it.
- CAPTCHAs, login walls and payment confirmations need a human: use call_user.
- A history step marked [FAILED: ...] did not take effect. If the same action failed twice, try a different approach.
`;

  constructor(
    protected readonly logger: Logger,
    protected readonly historyWindow: number = DEFAULT_HISTORY_WINDOW
  ) {}

  /**
   * Send the prompt and screenshot to the provider and return the raw reply text.
   */
  protected abstract processPrompt(request: VisionPrompt): Promise<string>;

  protected getSystemPrompt(): string {
    return BaseLLMProcessor.SYSTEM_PROMPT;
  }

  buildPrompt(input: DecisionInput): string {
    const { observation } = input;
    let visibleText = observation.visibleText.trim();
    let truncationNotice = '';
    if (visibleText.length > VISIBLE_TEXT_LIMIT) {
      visibleText = visibleText.substring(0, VISIBLE_TEXT_LIMIT);
      truncationNotice = `NOTE: Visible text was truncated to ${VISIBLE_TEXT_LIMIT} characters; scroll to see more.\n`;
    }

    return `
---
YOUR CURRENT TASK: ${input.instruction}
---
CURRENT PAGE:
URL: ${observation.url}
TITLE: ${observation.title}

OPEN TABS:
${formatOpenPages(input.openPages)}
---
VISIBLE TEXT:
${truncationNotice}${visibleText || 'No visible text.'}
---
TASK HISTORY:
${formatHistory(input.history, this.historyWindow)}
---
`;
  }

  async decide(input: DecisionInput): Promise<Decision> {
    const prompt = this.buildPrompt(input);

    this.logger.info('Generating next action', {
      provider: this.constructor.name,
      url: input.observation.url,
      historyLength: input.history.length,
      openPages: input.openPages.length
    });
    this.logger.debug('Built LLM prompt', { promptLength: prompt.length, prompt });

    let responseText: string;
    try {
      responseText = await this.processPrompt({
        systemPrompt: this.getSystemPrompt(),
        prompt,
        screenshotBase64: input.observation.screenshot.toString('base64')
      });
    } catch (error) {
      this.logger.error('LLM request failed', { provider: this.constructor.name, error });
      if (error instanceof DecisionError) throw error;
      throw new DecisionError(`${this.constructor.name} request failed: ${describeCause(error)}`, { cause: error });
    }

    this.logger.debug('LLM response received', { responseLength: responseText.length, responseText });
    return ActionExtractor.extract(responseText, this.logger);
  }
}

function formatOpenPages(pages: readonly OpenPage[]): string {
  if (pages.length === 0) return 'Only the current tab.';
  return pages
    .map(page => `#${page.index}${page.active ? ' [active]' : ''} ${page.title || '(untitled)'} - ${page.url}`)
    .join('\n');
}

function formatEntry(entry: HistoryEntry): string {
  const thought = entry.thought ? ` (${entry.thought})` : '';
  const failed = entry.error ? ` [FAILED: ${entry.error}]` : '';
  return `Step ${entry.step}: ${describeAction(fromRecord(entry.action))}${thought}${failed}`;
}

/**
 * The first entry plus the most recent `window` ones, with a marker for the gap.
 */
export function formatHistory(history: readonly HistoryEntry[], window: number): string {
  if (history.length === 0) return 'No previous actions.';

  const [first, ...rest] = history;
  if (first === undefined) return 'No previous actions.';

  const recent = rest.slice(-Math.max(1, window));
  const omitted = rest.length - recent.length;
  const lines = [formatEntry(first)];
  if (omitted > 0) {
    lines.push(`... ${omitted} earlier step${omitted === 1 ? '' : 's'} omitted ...`);
  }
  lines.push(...recent.map(formatEntry));
  return lines.join('\n');
}
