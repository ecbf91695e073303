/**
 * Settings
 *
 * Loads the process configuration once at startup: `.env` through dotenv, then
 * the environment validated by a zod schema into one immutable Settings object.
 * Components receive it through their constructors; nothing below this module
 * reads `process.env`.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../logging/logger';
import { getProviderById } from '../providers/registry';
import type { CaptureRegion, RegionMode } from '../vision/types';

export const SINK_KINDS = ['clipboard', 'log', 'discord', 'telegram', 'webhook'] as const;

export type SinkKind = (typeof SINK_KINDS)[number];

export interface Settings {
  capture: {
    region: CaptureRegion;
    regionMode: RegionMode;
    /** Display id handed to the screenshot backend; primary display when absent */
    display?: string;
  };
  ocr: {
    command: string;
    language: string;
    engineMode: number;
    segmentationMode: number;
  };
  ai: {
    provider: string;
    model: string;
    promptName?: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  /** API keys by provider id. Never logged, never written to run records. */
  apiKeys: Readonly<Record<string, string | undefined>>;
  sinks: {
    order: readonly SinkKind[];
    discordWebhook?: string;
    telegramBotToken?: string;
    telegramChatId?: string;
    webhookUrl?: string;
    timeoutMs: number;
  };
  files: {
    logDir: string;
    promptsFile: string;
    preferencesFile: string;
  };
  hotkeys: {
    capture: string;
    hide: string;
    show: string;
    panic: string;
  };
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const int = (fallback: number) => z.coerce.number().int().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  CAP_LEFT: int(40),
  CAP_TOP: int(40),
  CAP_WIDTH: positiveInt(1200),
  CAP_HEIGHT: positiveInt(700),
  REGION_MODE: z.enum(['manual', 'interactive']).default('manual'),
  CAPTURE_DISPLAY: optionalText,

  OCR_LANG: z.string().trim().min(1).default('fra'),
  OCR_OEM: int(3),
  OCR_PSM: int(6),
  TESSERACT_CMD: optionalText,

  PROVIDER: z
    .string()
    .trim()
    .default('openai')
    .transform((value) => value.toLowerCase())
    .refine((value) => getProviderById(value) !== undefined, {
      message: 'Unknown provider',
    }),
  MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  PROMPT: optionalText,
  LLM_TEMP: z.coerce.number().min(0).max(2).default(0),
  LLM_MAX_TOKENS: positiveInt(800),
  AI_TIMEOUT_MS: positiveInt(30000),

  OPENAI_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  GEMINI_API_KEY: optionalText,
  MISTRAL_API_KEY: optionalText,
  GROQ_API_KEY: optionalText,
  OPENROUTER_API_KEY: optionalText,

  SINKS: z
    .string()
    .default('clipboard,log')
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim().toLowerCase())
        .filter((name) => name.length > 0)
    )
    .pipe(z.array(z.enum(SINK_KINDS)))
    .refine((names) => new Set(names).size === names.length, {
      message: 'Sink listed more than once',
    }),
  DISCORD_WEBHOOK: optionalText,
  TELEGRAM_BOT_TOKEN: optionalText,
  TELEGRAM_CHAT_ID: optionalText,
  WEBHOOK_URL: optionalText,
  SINK_TIMEOUT_MS: positiveInt(10000),

  LOG_DIR: z.string().trim().min(1).default('logs'),
  PROMPTS_FILE: z.string().trim().min(1).default('prompts.json'),
  PREFERENCES_FILE: z.string().trim().min(1).default('preferences.json'),

  HOTKEY_CAPTURE: z.string().trim().min(1).default('f2'),
  HOTKEY_HIDE: z.string().trim().min(1).default('ctrl+shift+h'),
  HOTKEY_SHOW: z.string().trim().min(1).default('ctrl+shift+s'),
  HOTKEY_PANIC: z.string().trim().min(1).default('ctrl+shift+x'),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate an environment map into Settings. Throws ConfigError naming every
 * offending key.
 */
export function parseSettings(env: Record<string, string | undefined>): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  return deepFreeze<Settings>({
    capture: {
      region: { left: e.CAP_LEFT, top: e.CAP_TOP, width: e.CAP_WIDTH, height: e.CAP_HEIGHT },
      regionMode: e.REGION_MODE,
      ...(e.CAPTURE_DISPLAY ? { display: e.CAPTURE_DISPLAY } : {}),
    },
    ocr: {
      command: e.TESSERACT_CMD ?? 'tesseract',
      language: e.OCR_LANG,
      engineMode: e.OCR_OEM,
      segmentationMode: e.OCR_PSM,
    },
    ai: {
      provider: e.PROVIDER,
      model: e.MODEL,
      ...(e.PROMPT ? { promptName: e.PROMPT } : {}),
      temperature: e.LLM_TEMP,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.AI_TIMEOUT_MS,
    },
    apiKeys: {
      openai: e.OPENAI_API_KEY,
      anthropic: e.ANTHROPIC_API_KEY,
      gemini: e.GEMINI_API_KEY,
      mistral: e.MISTRAL_API_KEY,
      groq: e.GROQ_API_KEY,
      openrouter: e.OPENROUTER_API_KEY,
    },
    sinks: {
      order: e.SINKS,
      discordWebhook: e.DISCORD_WEBHOOK,
      telegramBotToken: e.TELEGRAM_BOT_TOKEN,
      telegramChatId: e.TELEGRAM_CHAT_ID,
      webhookUrl: e.WEBHOOK_URL,
      timeoutMs: e.SINK_TIMEOUT_MS,
    },
    files: {
      logDir: e.LOG_DIR,
      promptsFile: e.PROMPTS_FILE,
      preferencesFile: e.PREFERENCES_FILE,
    },
    hotkeys: {
      capture: e.HOTKEY_CAPTURE,
      hide: e.HOTKEY_HIDE,
      show: e.HOTKEY_SHOW,
      panic: e.HOTKEY_PANIC,
    },
    logLevel: e.LOG_LEVEL,
  });
}

/**
 * Load `.env` (when present) into the environment, then parse it.
 */
export function loadSettings(envPath?: string): Settings {
  loadDotenv(envPath ? { path: envPath } : undefined);
  return parseSettings(process.env);
}
