/**
 * Environment Configuration
 * Maps DISCORD_* variables onto the automation config.
 */

import { DEFAULT_CONFIG, type AutomationConfig, type Credentials } from './automation/types.js';

export interface DiscordWebConfig {
  automation: AutomationConfig;
  credentials: Credentials | null;
}

function intOr(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

function boolOr(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

function stringOr(value: string | undefined, fallback: string): string {
  return value && value.trim() ? value.trim() : fallback;
}

/**
 * Load configuration from environment variables. Unset or unparseable
 * values keep their defaults.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined>): DiscordWebConfig {
  const defaults = DEFAULT_CONFIG;
  const email = env.DISCORD_EMAIL?.trim();
  const password = env.DISCORD_PASSWORD;

  const automation: AutomationConfig = {
    ...defaults,
    headless: boolOr(env.DISCORD_HEADLESS, defaults.headless),
    executablePath: env.DISCORD_BROWSER_PATH?.trim() || undefined,
    sessionFile: stringOr(env.DISCORD_SESSION_FILE, defaults.sessionFile),
    extraWaitMs: intOr(env.DISCORD_EXTRA_WAIT_MS, defaults.extraWaitMs),
    uiVersion: stringOr(env.DISCORD_UI_VERSION, defaults.uiVersion),
    messageLimit: intOr(env.DISCORD_MESSAGE_LIMIT, defaults.messageLimit, 2),
    chunkDelayMs: intOr(env.DISCORD_CHUNK_DELAY_MS, defaults.chunkDelayMs),
    maxMessagesCeiling: intOr(env.DISCORD_MAX_MESSAGES_CEILING, defaults.maxMessagesCeiling, 1),
    operationTimeoutMs: intOr(env.DISCORD_OPERATION_TIMEOUT_MS, defaults.operationTimeoutMs, 1),
    mfaTimeoutMs: intOr(env.DISCORD_MFA_TIMEOUT_MS, defaults.mfaTimeoutMs, 1),
    rateLimits: {
      ...defaults.rateLimits,
      minSpacingMs: { ...defaults.rateLimits.minSpacingMs },
      maxRetries: intOr(env.DISCORD_MAX_RETRIES, defaults.rateLimits.maxRetries),
    },
  };

  return {
    automation,
    credentials: email && password ? { email, password } : null,
  };
}
