// src/core/shared/types.ts
import { Action, ActionKind, ActionRecord } from '../actions/types.js';
import { OpenPage, PageObservation } from '../browser/types.js';

/**
 * One decided step. History keeps serialized records so later mutation of an
 * action object can never rewrite the past.
 */
export interface HistoryEntry {
  step: number;
  thought: string;
  action: ActionRecord;
  timestamp: number;
  /** Set when the action could not be performed */
  error?: string;
}

export interface StepFailure {
  step: number;
  stage: 'capture' | 'decision' | 'action';
  kind: ActionKind | null;
  name: string;
  message: string;
  timestamp: number;
}

export interface DecisionInput {
  observation: PageObservation;
  instruction: string;
  history: readonly HistoryEntry[];
  openPages: readonly OpenPage[];
}

export interface Decision {
  thought: string;
  action: Action;
}
