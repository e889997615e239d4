/**
 * WebSinu Grades Sync Script
 *
 * Logs into every configured account, compares the grades with the last
 * saved snapshot and pushes new or changed grades to ntfy.
 *
 * Usage:
 *   npx tsx scripts/grades-sync.ts
 *
 * Environment:
 *   - NTFY_TOPIC_URL: ntfy topic URL (required)
 *   - WEBSINU_ACCOUNTS: comma separated account ids (default: STUDENT_A,STUDENT_B)
 *   - <ID>_WEBSINU_USERNAME / <ID>_WEBSINU_PASSWORD: credentials per account
 *   - WEBSINU_BASE_URL, ACCOUNT_DELAY_MS, HTTP_TIMEOUT_MS, SNAPSHOT_DIR
 *   - LOG_LEVEL (default: info), LOG_FILE (default: websinu_agent.log, empty disables)
 */

import { loadEnv, loadSyncConfig, credentialKeys, type SyncConfig } from "./_sync-utils.js";
import { createPortalClient } from "../src/portal/client.js";
import { createNtfyNotifier } from "../src/notify/ntfy.js";
import { createFileSnapshotStore } from "../src/store/snapshot-store.js";
import { runGradeChecks, type RunContext } from "../src/sync/grades-sync.js";
import { Logger } from "../src/shared/utils/logger.js";
import { getErrorMessage } from "../src/shared/utils/helpers.js";

// ============================================================================
// Configuration
// ============================================================================

function readConfig(): SyncConfig | null {
  try {
    return loadSyncConfig();
  } catch (error: unknown) {
    new Logger({ component: "Sync" }).error(`CRITICAL: ${getErrorMessage(error)}`);
    return null;
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  loadEnv();

  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = new Logger({ level: config.logLevel, component: "Sync", logFilePath: config.logFile });
  logger.debug(`Current working directory: ${process.cwd()}`);
  for (const account of config.accounts) {
    const keys = credentialKeys(account.id);
    logger.debug(`'${keys.username}' / '${keys.password}' loaded: ${account.credentials ? "Yes" : "No"}`);
  }

  const context: RunContext = {
    logger,
    notifier: createNtfyNotifier({ topicUrl: config.ntfyTopicUrl, logger: logger.child("Ntfy") }),
    store: createFileSnapshotStore({ directory: config.snapshotDir, logger: logger.child("SnapshotStore") }),
    createClient: (credentials) =>
      createPortalClient(credentials, {
        baseUrl: config.baseUrl,
        timeout: config.httpTimeoutMs,
        logger: logger.child("Portal"),
      }),
    accountDelayMs: config.accountDelayMs,
  };

  const outcomes = await runGradeChecks(context, config.accounts);

  for (const outcome of outcomes) {
    logger.info(
      `${outcome.accountId}: ${outcome.status} (new: ${outcome.newCount}, changed: ${outcome.changedCount}, saved: ${outcome.saved ? "yes" : "no"})`
    );
  }
}

// ============================================================================
// Entry Point
// ============================================================================

main().catch((err: unknown) => {
  console.error(`💥 Failed: ${getErrorMessage(err)}`);
  process.exit(1);
});
