/**
 * Every action kind the agent understands. The set is closed: anything else is
 * rejected at construction time.
 */
export const ACTION_KINDS = [
  'click',
  'double_click',
  'right_click',
  'drag',
  'hotkey',
  'type',
  'scroll',
  'wait',
  'switch_tab',
  'finished',
  'call_user',
  'start'
] as const;

export type ActionKind = typeof ACTION_KINDS[number];

/** Bounding box in viewport pixels: x1, y1, x2, y2. */
export type Region = readonly [number, number, number, number];

export type Point = readonly [number, number];

/** Wheel delta: dx, dy. */
export type ScrollDelta = readonly [number, number];

export interface PointerAction {
  readonly kind: 'click' | 'double_click' | 'right_click';
  readonly startRegion: Region;
}

export interface DragAction {
  readonly kind: 'drag';
  readonly startRegion: Region;
  readonly endRegion: Region;
}

export interface ScrollAction {
  readonly kind: 'scroll';
  readonly startRegion: Region;
  readonly scrollDelta: ScrollDelta;
}

export interface TypeAction {
  readonly kind: 'type';
  readonly text: string;
}

export interface HotkeyAction {
  readonly kind: 'hotkey';
  readonly keyName: string;
}

export interface SwitchTabAction {
  readonly kind: 'switch_tab';
  /** null selects the most recently opened tab */
  readonly tabIndex: number | null;
}

export interface CallUserAction {
  readonly kind: 'call_user';
  readonly question: string;
  readonly answer: string | null;
}

export interface MarkerAction {
  readonly kind: 'wait' | 'finished' | 'start';
}

export type Action =
  | PointerAction
  | DragAction
  | ScrollAction
  | TypeAction
  | HotkeyAction
  | SwitchTabAction
  | CallUserAction
  | MarkerAction;

export type ActionField =
  | 'text'
  | 'startRegion'
  | 'endRegion'
  | 'scrollDelta'
  | 'keyName'
  | 'tabIndex'
  | 'question'
  | 'answer';

/**
 * Flat, lossless form of an action used for history, logs and replay.
 * Fields that do not apply to the kind are present as null.
 */
export interface ActionRecord {
  kind: ActionKind;
  text: string | null;
  startRegion: [number, number, number, number] | null;
  endRegion: [number, number, number, number] | null;
  scrollDelta: [number, number] | null;
  keyName: string | null;
  tabIndex: number | null;
  question: string | null;
  answer: string | null;
}

/** Loose input accepted by createAction; null and undefined both mean absent. */
export type ActionParams = Partial<Record<ActionField, unknown>>;

export interface TypedText {
  content: string;
  submitAfter: boolean;
}
