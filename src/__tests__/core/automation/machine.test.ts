import { describe, test, expect } from '@jest/globals';
import { LoopController, LoopState, SessionHooks, StepReport, isTerminalState, runLoop } from '../../../core/automation/machine.js';
import { Action } from '../../../core/actions/types.js';
import { PageObservation } from '../../../core/browser/types.js';
import { Decision } from '../../../core/shared/types.js';
import { CaptureError, DecisionError, SessionError } from '../../../core/shared/errors.js';
import { AgentState } from '../../../utils/agentState.js';
import { FakeBrowser, ScriptedDecider, StubDispatcher, decision, makeObservation } from '../../utils/testHelpers.js';
import { createRecordingLogger, RecordingLogger } from '../../utils/mocks.js';

const FAST = { stepPacingMs: 0, decisionTimeoutMs: 1000 };

interface Harness {
  controller: LoopController;
  browser: FakeBrowser;
  decider: ScriptedDecider;
  dispatcher: StubDispatcher;
  logger: RecordingLogger;
}

function setup(options: {
  decider: ScriptedDecider;
  dispatcher?: StubDispatcher;
  observer?: { capture(): Promise<PageObservation> };
  hooks?: SessionHooks;
  cancellation?: AgentState;
  loop?: { maxSteps?: number; maxDecisionAttempts?: number; maxConsecutiveFailures?: number; decisionTimeoutMs?: number };
}): Harness {
  const browser = new FakeBrowser();
  const dispatcher = options.dispatcher ?? new StubDispatcher();
  const logger = createRecordingLogger();
  const controller = new LoopController(
    {
      observer: options.observer ?? browser,
      decider: options.decider,
      dispatcher,
      logger,
      hooks: options.hooks,
      cancellation: options.cancellation
    },
    { goal: 'buy a laptop', sessionId: 'session-1', ...FAST, ...options.loop }
  );
  return { controller, browser, decider: options.decider, dispatcher, logger };
}

function failingOn(kind: Action['kind'], attempts?: number[]): (action: Action, attempt: number) => void {
  return (action, attempt) => {
    if (action.kind === kind && (attempts === undefined || attempts.includes(attempt))) {
      throw new Error(`${kind} target vanished`);
    }
  };
}

describe('LoopController', () => {
  test('finished on the first step ends after exactly one step', async () => {
    const { controller, dispatcher } = setup({
      decider: new ScriptedDecider([decision('finished', {}, 'done')])
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(result.steps).toBe(1);
    expect(result.history).toHaveLength(2);
    expect(result.history.map(entry => [entry.step, entry.action.kind, entry.thought])).toEqual([
      [0, 'start', ''],
      [1, 'finished', 'done']
    ]);
    expect(dispatcher.attempts).toEqual(['finished']);
    expect(result.error).toBeNull();
  });

  test('call_user escalates with the literal question', async () => {
    const { controller } = setup({
      decider: new ScriptedDecider([decision('call_user', { question: 'confirm price?' }, 'need help')])
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Escalated);
    expect(result.escalation).toEqual({ question: 'confirm price?', answer: null });
  });

  test('a failed click does not stop the loop', async () => {
    const dispatcher = new StubDispatcher(failingOn('click', [1]));
    const { controller, logger } = setup({
      dispatcher,
      decider: new ScriptedDecider([
        decision('click', { startRegion: [0, 0, 10, 10] }),
        decision('click', { startRegion: [0, 0, 10, 10] }),
        decision('finished')
      ])
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(result.steps).toBe(3);
    expect(dispatcher.attempts).toEqual(['click', 'click', 'finished']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({
      step: 1,
      stage: 'action',
      kind: 'click',
      name: 'ActionExecutionError',
      message: 'Action click failed: click target vanished'
    });
    expect(logger.messages('ERROR')).toContain('Action click failed on attempt 1/1');
  });

  test('the next decision sees that the previous action failed', async () => {
    const decider = new ScriptedDecider([
      decision('click', { startRegion: [0, 0, 10, 10] }),
      decision('finished')
    ]);
    const { controller } = setup({ decider, dispatcher: new StubDispatcher(failingOn('click')) });

    const result = await controller.run();

    expect(decider.inputs[1]?.history[1]).toMatchObject({
      step: 1,
      action: { kind: 'click' },
      error: 'Action click failed: click target vanished'
    });
    expect(result.history[2]?.error).toBeUndefined();
  });

  test('switch_tab is retried once after a page refresh and its failure is not fatal', async () => {
    const dispatcher = new StubDispatcher(failingOn('switch_tab'));
    const { controller } = setup({
      dispatcher,
      decider: new ScriptedDecider([
        decision('switch_tab'),
        decision('hotkey', { keyName: 'Enter' }),
        decision('finished')
      ])
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(dispatcher.attempts).toEqual(['switch_tab', 'switch_tab', 'hotkey', 'finished']);
    expect(dispatcher.refreshCount).toBe(1);
    expect(result.failures.map(failure => failure.kind)).toEqual(['switch_tab']);
  });

  test('stop requested between steps prevents any further capture or decision', async () => {
    const cancellation = new AgentState();
    const hooks: SessionHooks = {
      onStepEnd: (report) => {
        if (report.step === 2) cancellation.requestStop('test');
      }
    };
    const { controller, browser, decider, dispatcher } = setup({
      cancellation,
      hooks,
      decider: new ScriptedDecider([decision('wait'), decision('wait'), decision('wait'), decision('finished')])
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Cancelled);
    expect(result.steps).toBe(2);
    expect(browser.calls.filter(call => call === 'capture')).toHaveLength(2);
    expect(decider.inputs).toHaveLength(2);
    expect(dispatcher.attempts).toEqual(['wait', 'wait']);
  });

  test('stop requested before the first step does no work', async () => {
    const cancellation = new AgentState();
    cancellation.requestStop();
    const { controller, browser, decider } = setup({
      cancellation,
      decider: new ScriptedDecider([decision('finished')])
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Cancelled);
    expect(result.steps).toBe(0);
    expect(result.history).toHaveLength(1);
    expect(browser.calls).toEqual([]);
    expect(decider.inputs).toHaveLength(0);
  });

  test('capture failure on the first step is fatal', async () => {
    const decider = new ScriptedDecider([decision('finished')]);
    const { controller } = setup({
      decider,
      observer: { capture: async () => { throw new Error('browser crashed'); } }
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Error);
    expect(result.error).toEqual({ name: 'CaptureError', message: 'Failed to capture page state: browser crashed' });
    expect(decider.inputs).toHaveLength(0);
  });

  test('capture failure on a later step skips that step', async () => {
    let captures = 0;
    const observer = {
      capture: async () => {
        captures++;
        if (captures === 2) throw new CaptureError('screenshot timed out');
        return makeObservation();
      }
    };
    const decider = new ScriptedDecider([decision('wait'), decision('finished')]);
    const { controller } = setup({ decider, observer });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(result.steps).toBe(3);
    expect(decider.inputs).toHaveLength(2);
    expect(result.failures).toEqual([
      expect.objectContaining({ step: 2, stage: 'capture', kind: null, message: 'screenshot timed out' })
    ]);
    expect(result.history.map(entry => entry.step)).toEqual([0, 1, 3]);
  });

  test('decision failures are retried within the step', async () => {
    const decider = new ScriptedDecider([
      new DecisionError('Model response contains no JSON object'),
      new Error('socket hang up'),
      decision('finished')
    ]);
    const { controller, logger } = setup({ decider, loop: { maxDecisionAttempts: 3 } });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(result.steps).toBe(1);
    expect(logger.messages('WARN')).toEqual([
      'Decision attempt 1/3 failed',
      'Decision attempt 2/3 failed'
    ]);
  });

  test('exhausted decision attempts end the session', async () => {
    const decider = new ScriptedDecider([new Error('503'), new Error('503')]);
    const { controller } = setup({ decider, loop: { maxDecisionAttempts: 2 } });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Error);
    expect(result.error).toEqual({ name: 'DecisionError', message: 'Decision failed: 503' });
    expect(result.history).toHaveLength(1);
  });

  test('a decision that never arrives times out', async () => {
    const decider = new ScriptedDecider([() => new Promise<Decision>(() => undefined)]);
    const { controller } = setup({ decider, loop: { maxDecisionAttempts: 1, decisionTimeoutMs: 20 } });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Error);
    expect(result.error).toEqual({ name: 'DecisionTimeoutError', message: 'Decision did not arrive within 20ms' });
  });

  test('gives up after too many failed steps in a row', async () => {
    const click = () => decision('click', { startRegion: [0, 0, 10, 10] });
    const { controller } = setup({
      dispatcher: new StubDispatcher(failingOn('click')),
      decider: new ScriptedDecider([click(), click(), click()]),
      loop: { maxConsecutiveFailures: 2 }
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Error);
    expect(result.steps).toBe(2);
    expect(result.error?.message).toBe('2 consecutive steps failed; giving up');
  });

  test('a successful step resets the failure count', async () => {
    const click = () => decision('click', { startRegion: [0, 0, 10, 10] });
    const { controller } = setup({
      dispatcher: new StubDispatcher(failingOn('click')),
      decider: new ScriptedDecider([click(), decision('wait'), click(), decision('finished')]),
      loop: { maxConsecutiveFailures: 2 }
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(result.failures).toHaveLength(2);
  });

  test('stops at the step limit', async () => {
    const { controller } = setup({
      decider: new ScriptedDecider([decision('wait'), decision('wait'), decision('wait')]),
      loop: { maxSteps: 2 }
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Error);
    expect(result.steps).toBe(2);
    expect(result.error?.message).toBe('Step limit of 2 reached without finishing');
  });

  test('the decision maker sees the goal, the history so far and a copy of it', async () => {
    const decider = new ScriptedDecider([decision('wait', {}, 'loading'), decision('finished')]);
    const { controller } = setup({ decider });

    const result = await controller.run();

    const second = decider.inputs[1];
    expect(second?.instruction).toBe('buy a laptop');
    expect(second?.history.map(entry => entry.action.kind)).toEqual(['start', 'wait']);
    expect(second?.openPages).toEqual([{ index: 0, url: 'https://example.com/', title: 'Page 0', active: true }]);

    const seen = decider.inputs[0]?.history[0];
    if (seen) seen.thought = 'rewritten';
    expect(result.history[0]?.thought).toBe('');
  });

  test('hooks see each step and a throwing hook changes nothing', async () => {
    const reports: StepReport[] = [];
    const ended: LoopState[] = [];
    const { controller, logger } = setup({
      decider: new ScriptedDecider([decision('wait'), decision('finished')]),
      hooks: {
        onStepStart: () => { throw new Error('hook broke'); },
        onStepEnd: (report) => { reports.push(report); },
        onSessionEnd: (result) => { ended.push(result.state); }
      }
    });

    const result = await controller.run();

    expect(result.state).toBe(LoopState.Finished);
    expect(reports.map(report => [report.step, report.status, report.action?.kind, report.state])).toEqual([
      [1, 'executed', 'wait', LoopState.Running],
      [2, 'executed', 'finished', LoopState.Finished]
    ]);
    expect(reports[0]?.observation?.url).toBe('https://example.com/');
    expect(ended).toEqual([LoopState.Finished]);
    expect(logger.messages('WARN')).toContain('Session hook onStepStart failed; continuing');
  });

  test('logs each state transition', async () => {
    const { controller, logger } = setup({ decider: new ScriptedDecider([decision('finished')]) });

    await controller.run();

    expect(logger.messages('INFO').filter(message => message.startsWith('State Transition'))).toEqual([
      'State Transition: RUNNING -> AWAITING_DECISION',
      'State Transition: AWAITING_DECISION -> RUNNING',
      'State Transition: RUNNING -> TERMINATED_FINISHED'
    ]);
  });

  test('a controller runs only once', async () => {
    const { controller } = setup({ decider: new ScriptedDecider([decision('finished')]) });
    await controller.run();

    await expect(controller.run()).rejects.toBeInstanceOf(SessionError);
  });

  test('runLoop drives a fresh controller', async () => {
    const result = await runLoop(
      {
        observer: new FakeBrowser(),
        decider: new ScriptedDecider([decision('finished')]),
        dispatcher: new StubDispatcher(),
        logger: createRecordingLogger()
      },
      { goal: 'noop', ...FAST }
    );

    expect(result.state).toBe(LoopState.Finished);
    expect(result.sessionId).toMatch(/^[0-9a-f-]{36}$/);
  });
});

test('terminal states', () => {
  expect(Object.values(LoopState).filter(isTerminalState)).toEqual([
    LoopState.Finished,
    LoopState.Escalated,
    LoopState.Error,
    LoopState.Cancelled
  ]);
});
