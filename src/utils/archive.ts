import fs from 'fs';
import path from 'path';
import { SessionError, describeCause } from '../core/shared/errors.js';
import type { SessionHooks, SessionResult, StepReport } from '../core/automation/machine.js';

export const LOG_FILE_NAME = 'agent.log';
export const HISTORY_FILE_NAME = 'history.json';

export interface ArchiveOptions {
  baseDir: string;
  startUrl: string;
  sessionId: string;
  now?: Date;
}

/** YYYYMMDD_HHMMSS in UTC */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

export function hostLabel(url: string): string {
  try {
    const host = new URL(url).hostname.replace(/^www\./, '');
    return host.replace(/[^a-zA-Z0-9.-]/g, '_') || 'site';
  } catch {
    return 'site';
  }
}

export function screenshotFileName(step: number): string {
  return `screenshot_${String(step).padStart(3, '0')}.png`;
}

/**
 * Per-task artifact directory. Screenshots are held in memory while the loop
 * runs and written out, with the history, by flush().
 */
export class SessionArchive {
  readonly logFilePath: string;
  private screenshots = new Map<number, Buffer>();
  private result: SessionResult | null = null;

  private constructor(readonly dir: string) {
    this.logFilePath = path.join(dir, LOG_FILE_NAME);
  }

  static async create(options: ArchiveOptions): Promise<SessionArchive> {
    const stamp = formatTimestamp(options.now ?? new Date());
    // The session prefix keeps concurrent sessions on the same site apart
    const name = `task_${stamp}_${hostLabel(options.startUrl)}_${options.sessionId.slice(0, 8)}`;
    const dir = path.join(options.baseDir, name);
    await fs.promises.mkdir(dir, { recursive: true });
    return new SessionArchive(dir);
  }

  addScreenshot(step: number, screenshot: Buffer): void {
    this.screenshots.set(step, screenshot);
  }

  get pendingScreenshots(): number {
    return this.screenshots.size;
  }

  recordResult(result: SessionResult): void {
    this.result = result;
  }

  hooks(): SessionHooks {
    return {
      onStepEnd: (report: StepReport) => {
        if (report.observation) {
          this.addScreenshot(report.step, report.observation.screenshot);
        }
      },
      onSessionEnd: (result: SessionResult) => {
        this.recordResult(result);
      }
    };
  }

  /**
   * Write buffered screenshots and the session history. Every file is attempted;
   * if any write failed, a SessionError naming each one is thrown afterwards.
   * Returns the files written.
   */
  async flush(): Promise<string[]> {
    const written: string[] = [];
    const failed: Array<{ file: string; error: unknown }> = [];
    const pending = [...this.screenshots.entries()].sort(([a], [b]) => a - b);
    this.screenshots.clear();

    const write = async (file: string, data: string | Buffer): Promise<void> => {
      try {
        await fs.promises.writeFile(file, data);
        written.push(file);
      } catch (error) {
        failed.push({ file, error });
      }
    };

    for (const [step, data] of pending) {
      await write(path.join(this.dir, screenshotFileName(step)), data);
    }

    if (this.result) {
      const { sessionId, goal, state, steps, history, failures, escalation, error, startedAt, finishedAt } = this.result;
      await write(
        path.join(this.dir, HISTORY_FILE_NAME),
        JSON.stringify({ sessionId, goal, state, steps, startedAt, finishedAt, escalation, error, history, failures }, null, 2)
      );
    }

    if (failed.length > 0) {
      const details = failed.map(({ file, error }) => `${path.basename(file)}: ${describeCause(error)}`);
      throw new SessionError(
        `Failed to write ${failed.length} artifact(s): ${details.join('; ')}`,
        { cause: failed.map(({ error }) => error) }
      );
    }

    return written;
  }
}
