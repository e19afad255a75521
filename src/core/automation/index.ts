// Export main components of the agent loop

export {
  LoopController,
  LoopState,
  DEFAULT_LOOP_OPTIONS,
  isTerminalState,
  runLoop
} from './machine.js';

export type {
  Escalation,
  LoopDependencies,
  LoopOptions,
  SessionHooks,
  SessionResult,
  StepReport,
  StepStartEvent,
  StepStatus
} from './machine.js';
