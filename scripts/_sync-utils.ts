/**
 * Shared Sync Utilities
 *
 * Environment loading and configuration for the grades sync script.
 */

import dotenv from "dotenv";
import { ConfigError } from "../src/shared/errors.js";
import { parseList, parsePositiveInt } from "../src/shared/utils/helpers.js";
import { isLogLevel, type LogLevel } from "../src/shared/utils/logger.js";
import type { AccountConfig } from "../src/sync/grades-sync.js";
import { WEBSINU_DEFAULT_BASE_URL } from "../src/portal/types/index.js";

// ============================================================================
// Environment
// ============================================================================

/**
 * Load environment variables from .env and .env.local
 */
export function loadEnv(): void {
  dotenv.config();
  dotenv.config({ path: ".env.local" });
}

export type Env = Readonly<Record<string, string | undefined>>;

export interface SyncConfig {
  ntfyTopicUrl: string;
  accounts: AccountConfig[];
  baseUrl: string;
  accountDelayMs: number;
  httpTimeoutMs: number;
  snapshotDir: string;
  logLevel: LogLevel;
  /** Undefined disables file logging */
  logFile?: string;
}

export const DEFAULT_ACCOUNTS = ["STUDENT_A", "STUDENT_B"];

/**
 * Names of the credential variables for an account id.
 */
export function credentialKeys(accountId: string): { username: string; password: string } {
  return {
    username: `${accountId}_WEBSINU_USERNAME`,
    password: `${accountId}_WEBSINU_PASSWORD`,
  };
}

/**
 * Build the sync configuration from environment variables.
 *
 * A missing NTFY_TOPIC_URL stops the run (ConfigError). Missing account
 * credentials do not: that account is returned with `credentials: null`
 * and skipped later.
 */
export function loadSyncConfig(env: Env = process.env): SyncConfig {
  const ntfyTopicUrl = env.NTFY_TOPIC_URL?.trim();
  if (!ntfyTopicUrl) {
    throw new ConfigError(
      "NTFY_TOPIC_URL is not set. Add NTFY_TOPIC_URL='https://ntfy.sh/<topic>' to your .env file.",
      { missing: ["NTFY_TOPIC_URL"] }
    );
  }

  const accountIds = parseList(env.WEBSINU_ACCOUNTS);
  const accounts = (accountIds.length > 0 ? accountIds : DEFAULT_ACCOUNTS).map((id): AccountConfig => {
    const keys = credentialKeys(id);
    const username = env[keys.username];
    const password = env[keys.password];
    return {
      id,
      credentials: username && password ? { username, password } : null,
    };
  });

  const logLevel = env.LOG_LEVEL?.toLowerCase() ?? "info";
  const logFile = env.LOG_FILE === undefined ? "websinu_agent.log" : env.LOG_FILE.trim();

  return {
    ntfyTopicUrl,
    accounts,
    baseUrl: env.WEBSINU_BASE_URL?.trim() || WEBSINU_DEFAULT_BASE_URL,
    accountDelayMs: parsePositiveInt(env.ACCOUNT_DELAY_MS, 5000),
    httpTimeoutMs: parsePositiveInt(env.HTTP_TIMEOUT_MS, 30000),
    snapshotDir: env.SNAPSHOT_DIR?.trim() || ".",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    logFile: logFile.length > 0 ? logFile : undefined,
  };
}
