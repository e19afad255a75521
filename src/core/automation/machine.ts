import { v4 as uuidv4 } from 'uuid';
import { Action, ActionRecord } from '../actions/types.js';
import { createAction, describeAction, toRecord } from '../actions/action.js';
import { BrowserCapabilities, OpenPage, PageObservation } from '../browser/types.js';
import { ActionDispatcher, ExecutionOutcome } from '../executor/executor.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, retryRuleFor } from '../executor/retryPolicy.js';
import { DecisionMaker } from '../llm/llmProcessor.js';
import { Decision, HistoryEntry, StepFailure } from '../shared/types.js';
import {
  ActionExecutionError,
  AgentError,
  CaptureError,
  DecisionError,
  DecisionTimeoutError,
  SessionError,
  describeCause
} from '../shared/errors.js';
import { AgentState } from '../../utils/agentState.js';
import { Logger } from '../../utils/logger.js';
import { sleep, withTimeout } from '../../utils/timing.js';

export enum LoopState {
  Running = 'RUNNING',
  AwaitingDecision = 'AWAITING_DECISION',
  Finished = 'TERMINATED_FINISHED',
  Escalated = 'TERMINATED_ESCALATED',
  Error = 'TERMINATED_ERROR',
  Cancelled = 'TERMINATED_CANCELLED'
}

const TERMINAL_STATES: ReadonlySet<LoopState> = new Set([
  LoopState.Finished,
  LoopState.Escalated,
  LoopState.Error,
  LoopState.Cancelled
]);

export function isTerminalState(state: LoopState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface LoopOptions {
  goal: string;
  sessionId: string;
  maxSteps: number;
  /** Pause between steps so the page can react */
  stepPacingMs: number;
  decisionTimeoutMs: number;
  /** Decision attempts per step before the session fails */
  maxDecisionAttempts: number;
  /** Failed steps in a row (capture or action) before the session fails */
  maxConsecutiveFailures: number;
  retryPolicy: RetryPolicy;
}

export const DEFAULT_LOOP_OPTIONS: Omit<LoopOptions, 'goal' | 'sessionId'> = {
  maxSteps: 50,
  stepPacingMs: 500,
  decisionTimeoutMs: 60000,
  maxDecisionAttempts: 3,
  maxConsecutiveFailures: 5,
  retryPolicy: DEFAULT_RETRY_POLICY
};

export type StepStatus = 'executed' | 'action_failed' | 'capture_failed' | 'decision_failed';

export interface StepStartEvent {
  sessionId: string;
  step: number;
}

export interface StepReport {
  sessionId: string;
  step: number;
  status: StepStatus;
  observation: PageObservation | null;
  thought: string | null;
  action: ActionRecord | null;
  openedPages: OpenPage[];
  error: string | null;
  state: LoopState;
}

export interface Escalation {
  question: string;
  answer: string | null;
}

export interface SessionResult {
  sessionId: string;
  goal: string;
  state: LoopState;
  /** Steps started, not counting the seeded start entry */
  steps: number;
  history: HistoryEntry[];
  failures: StepFailure[];
  escalation: Escalation | null;
  error: { name: string; message: string } | null;
  openPages: OpenPage[];
  startedAt: number;
  finishedAt: number;
}

/**
 * Observers of the loop. Hooks are awaited; one that throws is logged and
 * ignored.
 */
export interface SessionHooks {
  onStepStart?(event: StepStartEvent): void | Promise<void>;
  onStepEnd?(report: StepReport): void | Promise<void>;
  onSessionEnd?(result: SessionResult): void | Promise<void>;
}

export interface LoopDependencies {
  observer: Pick<BrowserCapabilities, 'capture'>;
  decider: DecisionMaker;
  dispatcher: ActionDispatcher;
  logger: Logger;
  hooks?: SessionHooks;
  cancellation?: AgentState;
}

/**
 * Observe, decide, act until a terminal action, a fatal error or cancellation.
 * One controller drives one session and runs once.
 */
export class LoopController {
  private readonly options: LoopOptions;
  private readonly logger: Logger;
  private readonly hooks: SessionHooks;
  private readonly cancellation: AgentState;

  private state: LoopState = LoopState.Running;
  private step = 0;
  private started = false;
  private consecutiveFailures = 0;
  private openPages: OpenPage[] = [];
  private escalation: Escalation | null = null;
  private fatalError: Error | null = null;
  private readonly history: HistoryEntry[] = [];
  private readonly failures: StepFailure[] = [];

  constructor(
    private readonly deps: LoopDependencies,
    options: Partial<LoopOptions> & { goal: string }
  ) {
    this.options = {
      ...DEFAULT_LOOP_OPTIONS,
      sessionId: uuidv4(),
      ...options
    };
    this.logger = deps.logger;
    this.hooks = deps.hooks ?? {};
    this.cancellation = deps.cancellation ?? new AgentState();
  }

  getState(): LoopState {
    return this.state;
  }

  getHistory(): HistoryEntry[] {
    return structuredClone(this.history);
  }

  /**
   * Drive the loop to a terminal state. Never rejects: unexpected errors end
   * the session in TERMINATED_ERROR.
   */
  async run(): Promise<SessionResult> {
    if (this.started) {
      throw new SessionError(`Session ${this.options.sessionId} has already run`);
    }
    this.started = true;

    const startedAt = Date.now();
    const { goal, sessionId, maxSteps } = this.options;

    this.history.push({ step: 0, thought: '', action: toRecord(createAction('start')), timestamp: startedAt });
    this.logger.info('Starting agent loop', { sessionId, goal, maxSteps });

    try {
      while (!isTerminalState(this.state)) {
        if (this.cancellation.isStopRequested()) {
          this.logger.info('Stop requested, terminating loop', {
            reason: this.cancellation.getStopReason(),
            completedSteps: this.step
          });
          this.transition(LoopState.Cancelled);
          break;
        }
        if (this.step >= maxSteps) {
          this.fail(new AgentError(`Step limit of ${maxSteps} reached without finishing`));
          break;
        }

        await this.runStep();

        if (!isTerminalState(this.state)) {
          await sleep(this.options.stepPacingMs);
        }
      }
    } catch (error) {
      this.logger.error('Unexpected error in agent loop', error);
      if (!isTerminalState(this.state)) {
        this.fail(error instanceof Error ? error : new AgentError(describeCause(error)));
      }
    }

    const result = this.buildResult(startedAt);
    await this.callHook('onSessionEnd', () => this.hooks.onSessionEnd?.(result));

    this.logger.info('Agent loop completed', {
      state: result.state,
      steps: result.steps,
      failures: result.failures.length,
      duration: `${Math.round((result.finishedAt - startedAt) / 1000)}s`
    });
    return result;
  }

  private async runStep(): Promise<void> {
    this.step += 1;
    const step = this.step;
    this.logger.info(`Step ${step}`);
    await this.callHook('onStepStart', () => this.hooks.onStepStart?.({ sessionId: this.options.sessionId, step }));

    let observation: PageObservation;
    try {
      observation = await this.deps.observer.capture();
    } catch (error) {
      const captureError = error instanceof CaptureError
        ? error
        : new CaptureError(`Failed to capture page state: ${describeCause(error)}`, { cause: error });
      this.recordFailure(step, 'capture', null, captureError);

      if (step === 1) {
        // Nothing earlier to decide from
        this.logger.error('Capture failed on the first step', captureError);
        this.fail(captureError);
      } else {
        this.logger.error(`Capture failed on step ${step}; skipping the step`, captureError);
        this.checkFailureCeiling();
      }
      await this.endStep({ step, status: 'capture_failed', observation: null, error: captureError.message });
      return;
    }

    this.transition(LoopState.AwaitingDecision);
    const decision = await this.decide(step, observation);
    if (decision === null) {
      await this.endStep({ step, status: 'decision_failed', observation, error: this.fatalError?.message ?? null });
      return;
    }
    this.transition(LoopState.Running);

    const { thought, action } = decision;
    const record = toRecord(action);
    const entry: HistoryEntry = { step, thought, action: record, timestamp: Date.now() };
    this.history.push(entry);
    this.logger.info(`Decided: ${describeAction(action)}`, { thought });

    const outcome = await this.dispatch(step, action);

    if (action.kind === 'finished') {
      this.transition(LoopState.Finished, { step, thought });
    } else if (action.kind === 'call_user') {
      this.escalation = { question: action.question, answer: action.answer };
      this.logger.warn('Operator assistance requested', this.escalation);
      this.transition(LoopState.Escalated, { step, question: action.question });
    }

    const lastFailure = outcome === null ? this.failures[this.failures.length - 1] : undefined;
    if (outcome === null) {
      // The next prompt must not present a failed action as done
      entry.error = lastFailure?.message ?? `Action ${action.kind} failed`;
      if (!isTerminalState(this.state)) {
        this.checkFailureCeiling();
      }
    }
    await this.endStep({
      step,
      status: outcome === null ? 'action_failed' : 'executed',
      observation,
      thought,
      action: record,
      openedPages: outcome?.openedPages ?? [],
      error: lastFailure?.message ?? null
    });
  }

  private async decide(step: number, observation: PageObservation): Promise<Decision | null> {
    const { maxDecisionAttempts, decisionTimeoutMs, goal } = this.options;
    let lastError: DecisionError | null = null;

    for (let attempt = 1; attempt <= maxDecisionAttempts; attempt++) {
      try {
        return await withTimeout(
          this.deps.decider.decide({
            observation,
            instruction: goal,
            history: structuredClone(this.history),
            openPages: [...this.openPages]
          }),
          decisionTimeoutMs,
          () => new DecisionTimeoutError(decisionTimeoutMs)
        );
      } catch (error) {
        lastError = error instanceof DecisionError
          ? error
          : new DecisionError(`Decision failed: ${describeCause(error)}`, { cause: error });
        this.logger.warn(`Decision attempt ${attempt}/${maxDecisionAttempts} failed`, lastError.message);
      }
    }

    const exhausted = lastError ?? new DecisionError('No decision attempts were made');
    this.recordFailure(step, 'decision', null, exhausted);
    this.fail(exhausted);
    return null;
  }

  private async dispatch(step: number, action: Action): Promise<ExecutionOutcome | null> {
    const rule = retryRuleFor(this.options.retryPolicy, action.kind);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= rule.maxAttempts; attempt++) {
      if (attempt > 1) {
        if (rule.refreshPagesBeforeRetry) {
          try {
            this.openPages = await this.deps.dispatcher.refreshPages();
          } catch (error) {
            this.logger.warn('Could not refresh the page list before retrying', error);
          }
        }
        await sleep(rule.backoffMs);
        this.logger.info(`Retrying ${action.kind} (attempt ${attempt}/${rule.maxAttempts})`);
      }

      try {
        const outcome = await this.deps.dispatcher.execute(action);
        this.openPages = outcome.openPages;
        this.consecutiveFailures = 0;
        return outcome;
      } catch (error) {
        lastError = error;
        this.logger.error(`Action ${action.kind} failed on attempt ${attempt}/${rule.maxAttempts}`, describeCause(error));
      }
    }

    const failure = lastError instanceof ActionExecutionError
      ? lastError
      : new ActionExecutionError(action.kind, lastError);
    this.recordFailure(step, 'action', action.kind, failure);
    return null;
  }

  private recordFailure(step: number, stage: StepFailure['stage'], kind: StepFailure['kind'], error: Error): void {
    this.failures.push({ step, stage, kind, name: error.name, message: error.message, timestamp: Date.now() });
    if (stage !== 'decision') {
      this.consecutiveFailures += 1;
    }
  }

  private checkFailureCeiling(): void {
    const { maxConsecutiveFailures } = this.options;
    if (this.consecutiveFailures >= maxConsecutiveFailures) {
      this.fail(new AgentError(`${this.consecutiveFailures} consecutive steps failed; giving up`));
    }
  }

  private fail(error: Error): void {
    this.fatalError = error;
    this.transition(LoopState.Error, { error: error.message });
  }

  private transition(next: LoopState, data?: unknown): void {
    if (this.state === next) return;
    if (isTerminalState(this.state)) {
      throw new SessionError(`Cannot leave terminal state ${this.state} for ${next}`);
    }
    this.logger.transition(`${this.state} -> ${next}`, data);
    this.state = next;
  }

  private async endStep(report: {
    step: number;
    status: StepStatus;
    observation: PageObservation | null;
    thought?: string;
    action?: ActionRecord;
    openedPages?: OpenPage[];
    error: string | null;
  }): Promise<void> {
    const full: StepReport = {
      sessionId: this.options.sessionId,
      step: report.step,
      status: report.status,
      observation: report.observation,
      thought: report.thought ?? null,
      action: report.action ?? null,
      openedPages: report.openedPages ?? [],
      error: report.error,
      state: this.state
    };
    await this.callHook('onStepEnd', () => this.hooks.onStepEnd?.(full));
  }

  private async callHook(name: keyof SessionHooks, invoke: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      this.logger.warn(`Session hook ${name} failed; continuing`, error);
    }
  }

  private buildResult(startedAt: number): SessionResult {
    return {
      sessionId: this.options.sessionId,
      goal: this.options.goal,
      state: this.state,
      steps: this.step,
      history: structuredClone(this.history),
      failures: [...this.failures],
      escalation: this.escalation,
      error: this.fatalError ? { name: this.fatalError.name, message: this.fatalError.message } : null,
      openPages: [...this.openPages],
      startedAt,
      finishedAt: Date.now()
    };
  }
}

/**
 * Convenience wrapper for callers that do not need the controller itself.
 */
export function runLoop(deps: LoopDependencies, options: Partial<LoopOptions> & { goal: string }): Promise<SessionResult> {
  return new LoopController(deps, options).run();
}
