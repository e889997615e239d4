/**
 * Grades Sync
 *
 * Checks every configured account one after another:
 * login → fetch → extract → diff → notify → save, with a fixed pause
 * between accounts so the portal does not see a burst of logins.
 *
 * A failure is scoped to its account: it is logged, reported through the
 * notifier, and the next account still runs. Notifications are best effort
 * and a failed save never undoes notifications already sent.
 */

import { diffGrades, hasChanges } from '../diff/index.js';
import type { GradeRecord } from '../grades/index.js';
import type { Notifier, NotifyOptions } from '../notify/ntfy.js';
import type { PortalClient } from '../portal/client.js';
import type { PortalCredentials } from '../portal/types/index.js';
import { ProtocolError, AuthError, type PortalError, type PortalErrorKind } from '../shared/errors.js';
import { delay, getErrorMessage } from '../shared/utils/helpers.js';
import type { Logger } from '../shared/utils/logger.js';
import type { SnapshotStore } from '../store/snapshot-store.js';

// ============================================================================
// Types
// ============================================================================

export interface AccountConfig {
  /** Identifier used in logs, notifications and the snapshot name */
  id: string;
  /** Null when the username or password is not configured */
  credentials: PortalCredentials | null;
}

export type GradesClient = Pick<PortalClient, 'login' | 'getGrades' | 'close'>;

/**
 * Everything a run needs, passed explicitly instead of module globals.
 */
export interface RunContext {
  logger: Logger;
  notifier: Notifier;
  store: SnapshotStore;
  createClient: (credentials: PortalCredentials) => GradesClient;
  /** Pause between two accounts in ms */
  accountDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export type AccountStatus =
  | 'skipped'
  | 'login-failed'
  | 'fetch-failed'
  | 'first-run'
  | 'checked';

export interface AccountOutcome {
  accountId: string;
  status: AccountStatus;
  newCount: number;
  changedCount: number;
  /** False when the snapshot could not be written */
  saved: boolean;
  error?: PortalError;
}

// ============================================================================
// Messages
// ============================================================================

export const FAILURE_CATEGORIES: Record<PortalErrorKind, string> = {
  auth: 'credentials rejected',
  protocol: 'portal page shape changed',
  network: 'portal unreachable or returned an error status',
  extraction: 'grades link or table not found',
  persistence: 'snapshot could not be written',
  config: 'configuration incomplete'
};

function describeFailure(kind: PortalErrorKind): string {
  return `${kind}: ${FAILURE_CATEGORIES[kind]}`;
}

export const SYNC_MESSAGES = {
  agentStarted: () => 'WebSinu Grades agent started!',
  credentialsMissing: (id: string) => `WebSinu credentials missing for user '${id}'. Skipping.`,
  accountStarted: (id: string) => `Agent started checking for user '${id}'.`,
  loginFailed: (id: string, kind: PortalErrorKind) =>
    `WebSinu login failed for ${id} (${describeFailure(kind)}). Check logs.`,
  fetchFailed: (id: string, kind: PortalErrorKind) =>
    `Failed to retrieve grades for ${id} (${describeFailure(kind)}). Check logs.`,
  newGrade: (id: string, record: GradeRecord) =>
    `New grade for ${id}: ${record.subject} is ${record.grade} (on ${record.date})`,
  changedGrade: (id: string, subject: string, oldGrade: string, newGrade: string, date: string) =>
    `Grade for ${id}: ${subject} changed from ${oldGrade} to ${newGrade} (on ${date})`,
  noChanges: (id: string) => `No new grades found for ${id}. All good.`,
  firstRun: (id: string, count: number) =>
    `First grade check completed for ${id}. Found ${count} grades. Will notify on changes.`,
  batchComplete: () => 'All WebSinu grade checks completed!'
} as const;

// ============================================================================
// Run
// ============================================================================

/**
 * Check all accounts in order and return one outcome per account.
 */
export async function runGradeChecks(context: RunContext, accounts: readonly AccountConfig[]): Promise<AccountOutcome[]> {
  const sleep = context.sleep ?? delay;
  const outcomes: AccountOutcome[] = [];

  await send(context, SYNC_MESSAGES.agentStarted(), { title: 'Agent Status', tags: ['robot'] });

  for (const [index, account] of accounts.entries()) {
    context.logger.info(`--- Processing grades for user: '${account.id}' ---`);
    outcomes.push(await checkAccount(context, account));

    if (index < accounts.length - 1) {
      context.logger.info(`Pausing for ${context.accountDelayMs}ms before next user...`);
      await sleep(context.accountDelayMs);
    }
  }

  context.logger.info('--- All user grade checks completed ---');
  await send(context, SYNC_MESSAGES.batchComplete(), { title: 'Agent Batch Complete', tags: ['checkmark', 'bell'] });

  return outcomes;
}

/**
 * Run the whole pipeline for one account. Never throws.
 */
export async function checkAccount(context: RunContext, account: AccountConfig): Promise<AccountOutcome> {
  const { logger, store } = context;
  const id = account.id;
  const outcome: AccountOutcome = { accountId: id, status: 'skipped', newCount: 0, changedCount: 0, saved: false };

  if (!account.credentials) {
    logger.error(`WebSinu username or password not configured for user '${id}'. Skipping this user.`);
    await send(context, SYNC_MESSAGES.credentialsMissing(id), { title: 'WebSinu Agent Error', tags: ['error', 'x'] });
    return outcome;
  }

  await send(context, SYNC_MESSAGES.accountStarted(id), { title: 'Agent Status', tags: ['robot', 'sync'] });

  const previous = await store.load(id);
  const client = context.createClient(account.credentials);

  try {
    const login = await client.login();
    if (!login.success) {
      outcome.status = 'login-failed';
      outcome.error = login.error;
      logFailure(logger, `Login failed for user '${id}'`, login.error, login.message);
      await send(context, SYNC_MESSAGES.loginFailed(id, login.error?.kind ?? 'auth'), { tags: ['error', 'x'] });
      return outcome;
    }

    const grades = await client.getGrades();
    if (!grades.success || grades.data.length === 0) {
      outcome.status = 'fetch-failed';
      outcome.error = grades.error;
      logFailure(logger, `Could not retrieve current grades for user '${id}'`, grades.error, grades.message);
      await send(context, SYNC_MESSAGES.fetchFailed(id, grades.error?.kind ?? 'extraction'), {
        tags: ['warning', 'exclamation']
      });
      return outcome;
    }

    const current = grades.data;
    logger.info(`Found ${current.length} current grades for user '${id}'.`);

    if (previous.length > 0) {
      outcome.status = 'checked';
      await reportChanges(context, id, previous, current, outcome);
    } else {
      outcome.status = 'first-run';
      logger.info(`First run or no previous grades for user '${id}'. Not comparing, just saving current grades.`);
      await send(context, SYNC_MESSAGES.firstRun(id, current.length), { tags: ['info'] });
    }

    try {
      await store.save(id, current);
      outcome.saved = true;
    } catch (error: unknown) {
      logger.error(getErrorMessage(error), error);
    }

    return outcome;
  } finally {
    await client.close();
  }
}

async function reportChanges(
  context: RunContext,
  id: string,
  previous: readonly GradeRecord[],
  current: readonly GradeRecord[],
  outcome: AccountOutcome
): Promise<void> {
  const diff = diffGrades(previous, current);
  outcome.newCount = diff.newRecords.length;
  outcome.changedCount = diff.changedRecords.length;

  for (const record of diff.newRecords) {
    const message = SYNC_MESSAGES.newGrade(id, record);
    await send(context, message, { title: `New WebSinu Grade for ${id}!`, tags: ['new', 'sparkles'] });
    context.logger.info(`Notified: ${message}`);
  }

  for (const change of diff.changedRecords) {
    const message = SYNC_MESSAGES.changedGrade(id, change.subject, change.oldGrade, change.newGrade, change.date);
    await send(context, message, { title: `WebSinu Grade Changed for ${id}!`, tags: ['changed', 'warning'] });
    context.logger.info(`Notified: ${message}`);
  }

  if (!hasChanges(diff)) {
    context.logger.info(`No new or changed grades found for user '${id}'.`);
    await send(context, SYNC_MESSAGES.noChanges(id), { tags: ['check'] });
  }
}

function logFailure(logger: Logger, prefix: string, error: PortalError | undefined, message: string): void {
  if (!error) {
    logger.error(`${prefix}: ${message}`);
    return;
  }

  logger.error(`${prefix} [${describeFailure(error.kind)}]: ${error.message}`);
  if (error instanceof ProtocolError) {
    logger.error(`Page snippet (${error.stage} login):\n${error.snippet}`);
  } else if (error instanceof AuthError) {
    logger.debug(`Response excerpt:\n${error.excerpt}`);
  }
}

async function send(context: RunContext, message: string, options: NotifyOptions): Promise<void> {
  try {
    const result = await context.notifier.notify(message, options);
    if (!result.ok) {
      context.logger.warn(`Notification not delivered (${result.error}); continuing`);
    }
  } catch (error: unknown) {
    context.logger.warn(`Notifier threw (${getErrorMessage(error)}); continuing`);
  }
}
