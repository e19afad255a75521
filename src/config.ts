import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from './utils/logger.js';
import { ConfigError } from './core/shared/errors.js';

dotenv.config();

export const LLM_PROVIDERS = ['openai', 'gemini', 'ollama'] as const;
export type LlmProvider = typeof LLM_PROVIDERS[number];

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o-mini',
  gemini: 'gemini-2.0-flash',
  ollama: 'llava'
};

/** Short names accepted wherever a start URL is */
export const START_SITES: Readonly<Record<string, string>> = {
  bing: 'https://www.bing.com/',
  google: 'https://www.google.com/',
  baidu: 'https://www.baidu.com/',
  weibo: 'https://weibo.com/',
  xiaohongshu: 'https://www.xiaohongshu.com/explore'
};

export function resolveStartUrl(value: string): string {
  const trimmed = value.trim();
  return START_SITES[trimmed.toLowerCase()] ?? trimmed;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const booleanFlag = (defaultValue: boolean) =>
  z.string()
    .transform(value => value.trim().toLowerCase())
    .refine(value => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), 'must be true or false')
    .transform(value => TRUE_VALUES.has(value))
    .optional()
    .transform(value => value ?? defaultValue);

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);
const nonNegativeInt = (defaultValue: number) => z.coerce.number().int().nonnegative().default(defaultValue);

const logLevelNames = Object.keys(LOG_LEVELS);

const envSchema = z.object({
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('openai'),
  LLM_MODEL: z.string().optional(),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  GEMINI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),

  START_URL: z.string().transform(resolveStartUrl).pipe(z.string().url()).default('https://www.bing.com/'),
  HEADLESS: booleanFlag(true),
  VIEWPORT_WIDTH: positiveInt(1920),
  VIEWPORT_HEIGHT: positiveInt(1080),
  CHROME_EXECUTABLE_PATH: z.string().optional(),
  CDP_ENDPOINT: z.string().url().optional(),
  SHOW_POINTER: booleanFlag(false),

  LOG_DIR: z.string().default('logs'),
  LOG_LEVEL: z.string()
    .transform(value => value.trim().toUpperCase())
    .refine((value): value is LogLevel => logLevelNames.includes(value), `must be one of ${logLevelNames.join(', ')}`)
    .default('INFO'),

  MAX_STEPS: positiveInt(50),
  STEP_PACING_MS: nonNegativeInt(500),
  DECISION_TIMEOUT_MS: positiveInt(60000),
  MAX_DECISION_ATTEMPTS: positiveInt(3),
  MAX_CONSECUTIVE_FAILURES: positiveInt(5),
  HISTORY_WINDOW: positiveInt(10),

  SETTLE_TIMEOUT_MS: nonNegativeInt(3000),
  TAB_LOAD_TIMEOUT_MS: nonNegativeInt(5000),
  WAIT_ACTION_MS: nonNegativeInt(2000)
});

export interface LlmSettings {
  provider: LlmProvider;
  model: string;
  temperature: number;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  geminiApiKey?: string;
  ollamaHost: string;
  /** How many recent history entries go into each prompt, besides the first */
  historyWindow: number;
}

export interface BrowserSettings {
  startUrl: string;
  headless: boolean;
  viewport: { width: number; height: number };
  executablePath?: string;
  cdpEndpoint?: string;
  showPointer: boolean;
}

export interface LoopSettings {
  maxSteps: number;
  stepPacingMs: number;
  decisionTimeoutMs: number;
  maxDecisionAttempts: number;
  maxConsecutiveFailures: number;
}

export interface ExecutorSettings {
  settleTimeoutMs: number;
  tabLoadTimeoutMs: number;
  waitActionMs: number;
}

export interface AgentConfig {
  llm: LlmSettings;
  browser: BrowserSettings;
  loop: LoopSettings;
  executor: ExecutorSettings;
  logging: { dir: string; level: LogLevel };
}

// `KEY=` in a .env file means unset, not empty
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  return {
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL ?? DEFAULT_MODELS[e.LLM_PROVIDER],
      temperature: e.LLM_TEMPERATURE,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, ''),
      geminiApiKey: e.GEMINI_API_KEY,
      ollamaHost: e.OLLAMA_HOST.replace(/\/+$/, ''),
      historyWindow: e.HISTORY_WINDOW
    },
    browser: {
      startUrl: e.START_URL,
      headless: e.HEADLESS,
      viewport: { width: e.VIEWPORT_WIDTH, height: e.VIEWPORT_HEIGHT },
      executablePath: e.CHROME_EXECUTABLE_PATH,
      cdpEndpoint: e.CDP_ENDPOINT,
      showPointer: e.SHOW_POINTER
    },
    loop: {
      maxSteps: e.MAX_STEPS,
      stepPacingMs: e.STEP_PACING_MS,
      decisionTimeoutMs: e.DECISION_TIMEOUT_MS,
      maxDecisionAttempts: e.MAX_DECISION_ATTEMPTS,
      maxConsecutiveFailures: e.MAX_CONSECUTIVE_FAILURES
    },
    executor: {
      settleTimeoutMs: e.SETTLE_TIMEOUT_MS,
      tabLoadTimeoutMs: e.TAB_LOAD_TIMEOUT_MS,
      waitActionMs: e.WAIT_ACTION_MS
    },
    logging: { dir: e.LOG_DIR, level: e.LOG_LEVEL }
  };
}
