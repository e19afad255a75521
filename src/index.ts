#!/usr/bin/env node
import readline from 'readline';
import { loadConfig, resolveStartUrl } from './config.js';
import { runSession } from './automation.js';
import { LoopState, SessionResult } from './core/automation/machine.js';
import { AgentState } from './utils/agentState.js';
import logger from './utils/logger.js';

export interface CliArguments {
  goal: string;
  startUrl?: string;
}

export function parseArguments(argv: string[]): CliArguments {
  const words: string[] = [];
  let startUrl: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === '--url') {
      startUrl = argv[i + 1];
      i++;
    } else if (arg.startsWith('--url=')) {
      startUrl = arg.slice('--url='.length);
    } else {
      words.push(arg);
    }
  }

  return { goal: words.join(' ').trim(), startUrl };
}

function promptUser(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function exitCodeFor(state: LoopState): number {
  switch (state) {
    case LoopState.Finished:
      return 0;
    case LoopState.Escalated:
      return 2;
    case LoopState.Cancelled:
      return 130;
    default:
      return 1;
  }
}

export function formatSummary(result: SessionResult): string {
  const lines = [
    `Session ${result.sessionId} ended in ${result.state} after ${result.steps} step(s).`
  ];
  if (result.failures.length > 0) {
    lines.push(`${result.failures.length} step(s) had failures.`);
  }
  if (result.escalation) {
    lines.push(`The agent needs your help: ${result.escalation.question}`);
  }
  if (result.error) {
    lines.push(`Error: ${result.error.message}`);
  }
  return lines.join('\n');
}

async function main(): Promise<number> {
  const args = parseArguments(process.argv.slice(2));
  const config = loadConfig();
  if (args.startUrl) {
    config.browser.startUrl = resolveStartUrl(args.startUrl);
  }

  const goal = args.goal || await promptUser('What should the agent do? ');
  if (!goal) {
    logger.warn('No goal given; nothing to do');
    return 1;
  }

  const cancellation = new AgentState();
  process.on('SIGINT', () => {
    if (cancellation.isStopRequested()) {
      console.log('\nSecond Ctrl+C, exiting immediately.');
      process.exit(130);
    }
    console.log('\nReceived SIGINT (Ctrl+C). Stopping after the current step...');
    cancellation.requestStop('SIGINT');
  });

  console.log('Agent started. Press Ctrl+C to stop gracefully.');
  const result = await runSession({ goal, config, cancellation });
  console.log(formatSummary(result));
  return exitCodeFor(result.state);
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Fatal error in main execution', error);
      process.exitCode = 1;
    });
}
