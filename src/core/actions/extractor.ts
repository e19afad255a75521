import { z } from 'zod';
import { ActionField, ActionParams } from './types.js';
import { createAction, describeAction } from './action.js';
import { Decision } from '../shared/types.js';
import { DecisionError, ValidationError, describeCause } from '../shared/errors.js';
import defaultLogger, { Logger } from '../../utils/logger.js';

// Vendor spellings seen in grounding-model output
const KIND_ALIASES: Readonly<Record<string, string>> = {
  left_single: 'click',
  left_click: 'click',
  left_double: 'double_click',
  doubleclick: 'double_click',
  right_single: 'right_click',
  rightclick: 'right_click',
  press: 'hotkey',
  key: 'hotkey',
  keypress: 'hotkey',
  input: 'type',
  finish: 'finished',
  done: 'finished',
  switch_page: 'switch_tab',
  ask_user: 'call_user',
  ask_human: 'call_user'
};

// Keyed by lowercased name with underscores and dashes removed
const FIELD_ALIASES: Readonly<Record<string, ActionField>> = {
  startbox: 'startRegion',
  startregion: 'startRegion',
  box: 'startRegion',
  region: 'startRegion',
  endbox: 'endRegion',
  endregion: 'endRegion',
  deltas: 'scrollDelta',
  delta: 'scrollDelta',
  scrolldelta: 'scrollDelta',
  content: 'text',
  text: 'text',
  key: 'keyName',
  keyname: 'keyName',
  hotkey: 'keyName',
  tabindex: 'tabIndex',
  index: 'tabIndex',
  question: 'question',
  message: 'question',
  answer: 'answer'
};

const REGION_FIELDS: ReadonlySet<ActionField> = new Set<ActionField>(['startRegion', 'endRegion']);

const objectSchema = z.record(z.unknown());

const envelopeSchema = z.object({
  thought: z.string().optional(),
  action: z.union([z.string().min(1), objectSchema]),
  parameters: objectSchema.nullish()
});

export class ActionExtractor {
  constructor(private readonly logger: Logger = defaultLogger) {}

  static extract(rawText: string, logger?: Logger): Decision {
    return new ActionExtractor(logger).processRawDecision(rawText);
  }

  /**
   * Parse `{"Thought": ..., "Action": ..., "Parameters": {...}}` out of a model
   * reply. Fences and surrounding prose are tolerated; anything else is a
   * DecisionError.
   */
  processRawDecision(rawText: string): Decision {
    this.logger.debug('Starting decision extraction', {
      textLength: rawText.length,
      preview: rawText.substring(0, 200)
    });

    const envelope = this.parseEnvelope(this.extractJson(rawText));

    let kind: string;
    let rawParams: Record<string, unknown>;
    if (typeof envelope.action === 'string') {
      kind = envelope.action;
      rawParams = envelope.parameters ?? {};
    } else {
      const { type, kind: nestedKind, name, ...rest } = lowerKeys(envelope.action);
      const candidate = [nestedKind, type, name].find((value): value is string => typeof value === 'string');
      if (candidate === undefined) {
        throw new DecisionError('Model response names no action kind');
      }
      kind = candidate;
      rawParams = { ...rest, ...(envelope.parameters ?? {}) };
    }

    const normalizedKind = normalizeKind(kind);
    const params = normalizeParams(rawParams);

    try {
      const action = createAction(normalizedKind, params);
      const thought = envelope.thought?.trim() ?? '';
      this.logger.debug('Decision extracted', { thought, action: describeAction(action) });
      return { thought, action };
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new DecisionError(`Model proposed an invalid action: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private extractJson(rawText: string): unknown {
    const text = rawText.replace(/```(?:json)?/gi, '').trim();
    if (text.length === 0) {
      throw new DecisionError('Model response is empty');
    }

    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new DecisionError('Model response contains no JSON object');
    }

    try {
      const parsed: unknown = JSON.parse(text.slice(start, end + 1));
      return parsed;
    } catch (error) {
      this.logger.debug('JSON parsing failed', { candidate: text.slice(start, Math.min(end + 1, start + 200)) });
      throw new DecisionError(`Model response is not valid JSON: ${describeCause(error)}`, { cause: error });
    }
  }

  private parseEnvelope(value: unknown): z.infer<typeof envelopeSchema> {
    const asObject = objectSchema.safeParse(value);
    if (!asObject.success) {
      throw new DecisionError('Model response JSON is not an object');
    }

    const parsed = envelopeSchema.safeParse(lowerKeys(asObject.data));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DecisionError(
        `Model response does not match the decision format${issue ? ` at '${issue.path.join('.')}': ${issue.message}` : ''}`
      );
    }
    return parsed.data;
  }
}

export function parseDecision(rawText: string, logger?: Logger): Decision {
  return ActionExtractor.extract(rawText, logger);
}

function lowerKeys(source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

export function normalizeKind(kind: string): string {
  const key = kind.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return KIND_ALIASES[key] ?? key;
}

export function normalizeParams(raw: Record<string, unknown>): ActionParams {
  const params: ActionParams = {};
  for (const [key, value] of Object.entries(raw)) {
    const field = FIELD_ALIASES[key.toLowerCase().replace(/[_-]/g, '')];
    if (field === undefined || value === null || value === undefined) continue;
    params[field] = coerceField(field, value);
  }
  return params;
}

function coerceField(field: ActionField, value: unknown): unknown {
  if (REGION_FIELDS.has(field)) {
    const numbers = readNumbers(value);
    if (numbers?.length === 4) return numbers;
    // A bare point becomes a zero-size region
    if (numbers?.length === 2) return [numbers[0], numbers[1], numbers[0], numbers[1]];
    return value;
  }
  if (field === 'scrollDelta') {
    const numbers = readNumbers(value);
    return numbers?.length === 2 ? numbers : value;
  }
  if (field === 'tabIndex' && typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number(value);
  }
  return value;
}

// Accepts "(10, 20, 30, 40)", "<|box_start|>(10,20)<|box_end|>", [10, "20"], ...
function readNumbers(value: unknown): number[] | null {
  if (typeof value === 'string') {
    const matches = value.match(/-?\d+(?:\.\d+)?/g);
    return matches ? matches.map(Number) : null;
  }
  if (Array.isArray(value)) {
    const numbers: number[] = [];
    for (const item of value) {
      const n = typeof item === 'number' ? item : typeof item === 'string' ? Number(item.trim()) : NaN;
      if (!Number.isFinite(n)) return null;
      numbers.push(n);
    }
    return numbers;
  }
  return null;
}
