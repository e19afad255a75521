import { v4 as uuidv4 } from 'uuid';
import { AgentConfig, BrowserSettings, LlmSettings } from './config.js';
import { BrowserSession } from './core/browser/types.js';
import { PlaywrightBrowser } from './core/browser/playwrightBrowser.js';
import { ActionExecutor } from './core/executor/executor.js';
import { createDecisionMaker, DecisionMaker } from './core/llm/index.js';
import { LoopController, SessionHooks, SessionResult } from './core/automation/machine.js';
import { SessionError, describeCause } from './core/shared/errors.js';
import { AgentState } from './utils/agentState.js';
import { SessionArchive } from './utils/archive.js';
import { createLogger, Logger } from './utils/logger.js';

export type BrowserLauncher = (settings: BrowserSettings, logger: Logger) => Promise<BrowserSession>;
export type DecisionMakerFactory = (settings: LlmSettings, logger: Logger) => DecisionMaker;

export interface SessionOptions {
  goal: string;
  config: AgentConfig;
  cancellation?: AgentState;
  hooks?: SessionHooks;
  /** Defaults to a Playwright Chromium session */
  launchBrowser?: BrowserLauncher;
  /** Defaults to the configured LLM provider */
  createDecisionMaker?: DecisionMakerFactory;
  /** Mirror the session log to the console */
  console?: boolean;
}

export const launchPlaywright: BrowserLauncher = (settings, logger) =>
  PlaywrightBrowser.launch(settings, logger);

/**
 * Chain several hook sets; each hook of each set is called in order.
 */
export function combineHooks(...sets: Array<SessionHooks | undefined>): SessionHooks {
  const present = sets.filter((set): set is SessionHooks => set !== undefined);
  return {
    onStepStart: async (event) => {
      for (const set of present) await set.onStepStart?.(event);
    },
    onStepEnd: async (report) => {
      for (const set of present) await set.onStepEnd?.(report);
    },
    onSessionEnd: async (result) => {
      for (const set of present) await set.onSessionEnd?.(result);
    }
  };
}

/**
 * Run one task end to end: open the artifact directory and session log, launch
 * the browser, drive the loop, then release everything. A browser that cannot
 * be started is fatal and rejects with SessionError.
 */
export async function runSession(options: SessionOptions): Promise<SessionResult> {
  const { goal, config } = options;
  const sessionId = uuidv4();
  const archive = await SessionArchive.create({
    baseDir: config.logging.dir,
    startUrl: config.browser.startUrl,
    sessionId
  });
  const logger = createLogger({
    filePath: archive.logFilePath,
    level: config.logging.level,
    console: options.console ?? true
  });

  logger.info('Task started', { sessionId, goal, startUrl: config.browser.startUrl, artifacts: archive.dir });

  let browser: BrowserSession | null = null;
  try {
    const decider = (options.createDecisionMaker ?? createDecisionMaker)(config.llm, logger);
    browser = await (options.launchBrowser ?? launchPlaywright)(config.browser, logger);

    const executor = new ActionExecutor(browser, logger, config.executor);
    const controller = new LoopController(
      {
        observer: browser,
        decider,
        dispatcher: executor,
        logger,
        hooks: combineHooks(archive.hooks(), options.hooks),
        cancellation: options.cancellation
      },
      { ...config.loop, goal, sessionId }
    );

    return await controller.run();
  } finally {
    await releaseSession(logger, browser, archive);
  }
}

// Each release runs even when an earlier one failed
async function releaseSession(logger: Logger, browser: BrowserSession | null, archive: SessionArchive): Promise<void> {
  const releases: Array<[string, () => Promise<unknown>]> = [
    ['browser', async () => { if (browser) await browser.close(); }],
    ['artifacts', () => archive.flush()]
  ];

  for (const [name, release] of releases) {
    try {
      await release();
    } catch (error) {
      const failure = new SessionError(`Failed to release ${name}: ${describeCause(error)}`, { cause: error });
      logger.error(failure.message, error);
    }
  }

  logger.info('Session resources released', { artifacts: archive.dir });
  try {
    await logger.close();
  } catch (error) {
    console.error(`Failed to close session log: ${describeCause(error)}`);
  }
}
