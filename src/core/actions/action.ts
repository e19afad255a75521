import { z } from 'zod';
import {
  ACTION_KINDS,
  Action,
  ActionField,
  ActionKind,
  ActionParams,
  ActionRecord,
  Point,
  Region,
  TypedText
} from './types.js';
import {
  InvalidFieldError,
  InvalidKindError,
  MissingFieldError,
  ValidationError
} from '../shared/errors.js';

/**
 * Fields each kind must carry. Construction consults this table and nothing else
 * to decide whether an action is complete.
 */
export const REQUIRED_FIELDS: Readonly<Record<ActionKind, readonly ActionField[]>> = {
  click: ['startRegion'],
  double_click: ['startRegion'],
  right_click: ['startRegion'],
  drag: ['startRegion', 'endRegion'],
  scroll: ['startRegion', 'scrollDelta'],
  type: ['text'],
  hotkey: ['keyName'],
  switch_tab: [],
  call_user: ['question'],
  wait: [],
  finished: [],
  start: []
};

/** Kinds that end the loop. */
export const TERMINAL_KINDS: ReadonlySet<ActionKind> = new Set<ActionKind>(['finished', 'call_user']);

/** Kinds that never touch the browser. */
export const MARKER_KINDS: ReadonlySet<ActionKind> = new Set<ActionKind>(['finished', 'call_user', 'start']);

const coordinate = z.number().finite();
const regionSchema = z.tuple([coordinate, coordinate, coordinate, coordinate]);
const deltaSchema = z.tuple([coordinate, coordinate]);
const textSchema = z.string();
const keySchema = z.string().min(1, 'must not be empty');
const tabIndexSchema = z.number().int().nonnegative();

const recordSchema = z.object({
  kind: z.string(),
  text: textSchema.nullable(),
  startRegion: regionSchema.nullable(),
  endRegion: regionSchema.nullable(),
  scrollDelta: deltaSchema.nullable(),
  keyName: textSchema.nullable(),
  tabIndex: z.number().nullable(),
  question: textSchema.nullable(),
  answer: textSchema.nullable()
});

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some(kind => kind === value);
}

function readField<T>(kind: ActionKind, field: ActionField, raw: unknown, schema: z.ZodType<T>): T | null {
  if (raw === undefined || raw === null) return null;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidFieldError(kind, field, parsed.error.issues[0]?.message ?? 'invalid value');
  }
  return parsed.data;
}

function present<T>(kind: ActionKind, field: ActionField, value: T | null): T {
  if (value === null) throw new MissingFieldError(kind, field);
  return value;
}

function frozenRegion(region: Region): Region {
  return Object.freeze([region[0], region[1], region[2], region[3]] as const);
}

/**
 * Build a validated, frozen action. Parameters that do not belong to the kind
 * are ignored.
 */
export function createAction(kind: string, params: ActionParams = {}): Action {
  if (!isActionKind(kind)) {
    throw new InvalidKindError(kind);
  }

  for (const field of REQUIRED_FIELDS[kind]) {
    if (params[field] === undefined || params[field] === null) {
      throw new MissingFieldError(kind, field);
    }
  }

  switch (kind) {
    case 'click':
    case 'double_click':
    case 'right_click': {
      const startRegion = present(kind, 'startRegion', readField(kind, 'startRegion', params.startRegion, regionSchema));
      return Object.freeze({ kind, startRegion: frozenRegion(startRegion) });
    }
    case 'drag': {
      const startRegion = present(kind, 'startRegion', readField(kind, 'startRegion', params.startRegion, regionSchema));
      const endRegion = present(kind, 'endRegion', readField(kind, 'endRegion', params.endRegion, regionSchema));
      return Object.freeze({ kind, startRegion: frozenRegion(startRegion), endRegion: frozenRegion(endRegion) });
    }
    case 'scroll': {
      const startRegion = present(kind, 'startRegion', readField(kind, 'startRegion', params.startRegion, regionSchema));
      const delta = present(kind, 'scrollDelta', readField(kind, 'scrollDelta', params.scrollDelta, deltaSchema));
      return Object.freeze({
        kind,
        startRegion: frozenRegion(startRegion),
        scrollDelta: Object.freeze([delta[0], delta[1]] as const)
      });
    }
    case 'type':
      return Object.freeze({ kind, text: present(kind, 'text', readField(kind, 'text', params.text, textSchema)) });
    case 'hotkey':
      return Object.freeze({ kind, keyName: present(kind, 'keyName', readField(kind, 'keyName', params.keyName, keySchema)) });
    case 'switch_tab':
      return Object.freeze({ kind, tabIndex: readField(kind, 'tabIndex', params.tabIndex, tabIndexSchema) });
    case 'call_user':
      return Object.freeze({
        kind,
        question: present(kind, 'question', readField(kind, 'question', params.question, keySchema)),
        answer: readField(kind, 'answer', params.answer, textSchema)
      });
    case 'wait':
    case 'finished':
    case 'start':
      return Object.freeze({ kind });
    default: {
      const unreachable: never = kind;
      throw new InvalidKindError(String(unreachable));
    }
  }
}

/**
 * Midpoint of a region. Uses true division, so odd-sized boxes yield half pixels.
 */
export function centerOf(region: Region): Point {
  return [(region[0] + region[2]) / 2, (region[1] + region[3]) / 2];
}

// A real newline, or the two-character escape models tend to emit inside JSON strings.
const SUBMIT_SENTINELS = ['\n', '\\n'];

/**
 * Split typed text into what to type and whether to press Enter afterwards.
 */
export function parseTypedText(source: Action | string | null | undefined): TypedText {
  let text = '';
  if (typeof source === 'string') {
    text = source;
  } else if (source && source.kind === 'type') {
    text = source.text;
  }

  for (const sentinel of SUBMIT_SENTINELS) {
    if (text.endsWith(sentinel)) {
      return { content: text.slice(0, -sentinel.length), submitAfter: true };
    }
  }
  return { content: text, submitAfter: false };
}

function emptyRecord(kind: ActionKind): ActionRecord {
  return {
    kind,
    text: null,
    startRegion: null,
    endRegion: null,
    scrollDelta: null,
    keyName: null,
    tabIndex: null,
    question: null,
    answer: null
  };
}

function copyRegion(region: Region): [number, number, number, number] {
  return [region[0], region[1], region[2], region[3]];
}

export function toRecord(action: Action): ActionRecord {
  const record = emptyRecord(action.kind);
  switch (action.kind) {
    case 'click':
    case 'double_click':
    case 'right_click':
      record.startRegion = copyRegion(action.startRegion);
      break;
    case 'drag':
      record.startRegion = copyRegion(action.startRegion);
      record.endRegion = copyRegion(action.endRegion);
      break;
    case 'scroll':
      record.startRegion = copyRegion(action.startRegion);
      record.scrollDelta = [action.scrollDelta[0], action.scrollDelta[1]];
      break;
    case 'type':
      record.text = action.text;
      break;
    case 'hotkey':
      record.keyName = action.keyName;
      break;
    case 'switch_tab':
      record.tabIndex = action.tabIndex;
      break;
    case 'call_user':
      record.question = action.question;
      record.answer = action.answer;
      break;
    case 'wait':
    case 'finished':
    case 'start':
      break;
  }
  return record;
}

export function fromRecord(record: unknown): Action {
  const parsed = recordSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Malformed action record${issue ? ` at '${issue.path.join('.')}': ${issue.message}` : ''}`
    );
  }
  const { kind, ...params } = parsed.data;
  return createAction(kind, params);
}

function formatPoint(point: Point): string {
  return `(${point[0]}, ${point[1]})`;
}

/**
 * One-line description for logs and prompts. Never parsed back.
 */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'click':
    case 'double_click':
    case 'right_click':
      return `${action.kind} at ${formatPoint(centerOf(action.startRegion))}`;
    case 'drag':
      return `drag from ${formatPoint(centerOf(action.startRegion))} to ${formatPoint(centerOf(action.endRegion))}`;
    case 'scroll':
      return `scroll by ${formatPoint(action.scrollDelta)} at ${formatPoint(centerOf(action.startRegion))}`;
    case 'type':
      return `type ${JSON.stringify(action.text)}`;
    case 'hotkey':
      return `hotkey ${action.keyName}`;
    case 'switch_tab':
      return `switch_tab to ${action.tabIndex === null ? 'latest' : `#${action.tabIndex}`}`;
    case 'call_user':
      return `call_user ${JSON.stringify(action.question)}`;
    case 'wait':
    case 'finished':
    case 'start':
      return action.kind;
  }
}

export function isTerminalAction(action: Action): boolean {
  return TERMINAL_KINDS.has(action.kind);
}
