import { ActionKind } from '../actions/types.js';

export interface RetryRule {
  /** Total dispatch attempts, including the first */
  maxAttempts: number;
  backoffMs: number;
  /** Re-read the open page list before each retry */
  refreshPagesBeforeRetry: boolean;
}

const SINGLE_ATTEMPT: RetryRule = { maxAttempts: 1, backoffMs: 0, refreshPagesBeforeRetry: false };

export type RetryPolicy = Readonly<Record<ActionKind, RetryRule>>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  click: SINGLE_ATTEMPT,
  double_click: SINGLE_ATTEMPT,
  right_click: SINGLE_ATTEMPT,
  drag: SINGLE_ATTEMPT,
  hotkey: SINGLE_ATTEMPT,
  type: SINGLE_ATTEMPT,
  scroll: SINGLE_ATTEMPT,
  wait: SINGLE_ATTEMPT,
  // A tab that just opened may not be listed yet
  switch_tab: { maxAttempts: 2, backoffMs: 0, refreshPagesBeforeRetry: true },
  finished: SINGLE_ATTEMPT,
  call_user: SINGLE_ATTEMPT,
  start: SINGLE_ATTEMPT
};

export function retryRuleFor(policy: RetryPolicy, kind: ActionKind): RetryRule {
  const rule = policy[kind];
  return { ...rule, maxAttempts: Math.max(1, Math.floor(rule.maxAttempts)) };
}
