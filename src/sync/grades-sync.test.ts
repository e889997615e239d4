import { describe, it, expect, vi } from 'vitest';
import { runGradeChecks, type AccountConfig, type GradesClient, type RunContext } from './grades-sync.js';
import type { GradeRecord } from '../grades/index.js';
import type { Notifier, NotifyOptions, NotifyResult } from '../notify/ntfy.js';
import type { PortalGradesResult, PortalLoginResult } from '../portal/types/index.js';
import { AuthError, ExtractionError, NetworkError, PersistenceError, ProtocolError, type PortalError } from '../shared/errors.js';
import { Logger } from '../shared/utils/logger.js';
import type { SnapshotStore } from '../store/snapshot-store.js';

// ============================================================================
// Fakes
// ============================================================================

const credentials = { username: 'student01', password: 'test-secret' };

function grade(subject: string, semester: string, value: string, date: string = '2024-06-20'): GradeRecord {
  return { year: '1', semester, subject, type: 'Examen', date, grade: value };
}

class RecordingNotifier implements Notifier {
  sent: Array<{ message: string; options: NotifyOptions }> = [];

  async notify(message: string, options: NotifyOptions = {}): Promise<NotifyResult> {
    this.sent.push({ message, options });
    return { ok: true };
  }

  get messages(): string[] {
    return this.sent.map(entry => entry.message);
  }
}

class MemoryStore implements SnapshotStore {
  snapshots = new Map<string, GradeRecord[]>();

  async load(accountId: string): Promise<GradeRecord[]> {
    return this.snapshots.get(accountId) ?? [];
  }

  async save(accountId: string, records: readonly GradeRecord[]): Promise<void> {
    this.snapshots.set(accountId, [...records]);
  }
}

const LOGGED_IN: PortalLoginResult = { success: true, message: 'Authenticated via direct login', path: 'direct' };

function gradesResult(data: GradeRecord[]): PortalGradesResult {
  return { success: true, message: `Extracted ${data.length} grades`, data, timestamp: new Date() };
}

function fakeClient(login: PortalLoginResult, grades: PortalGradesResult) {
  return {
    login: vi.fn(async () => login),
    getGrades: vi.fn(async () => grades),
    close: vi.fn(async () => undefined)
  } satisfies GradesClient;
}

function setup(clients: GradesClient[]) {
  const notifier = new RecordingNotifier();
  const store = new MemoryStore();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const queue = [...clients];
  const context: RunContext = {
    logger: new Logger({ level: 'silent' }),
    notifier,
    store,
    createClient: () => {
      const next = queue.shift();
      if (!next) throw new Error('No fake client left');
      return next;
    },
    accountDelayMs: 5000,
    sleep
  };
  return { context, notifier, store, sleep };
}

// ============================================================================
// Tests
// ============================================================================

describe('runGradeChecks', () => {
  it('skips an account without credentials and records a first run for the next', async () => {
    const current = [grade('Algebra liniara', '1', '9'), grade('Baze de date', '2', '10')];
    const { context, notifier, store, sleep } = setup([fakeClient(LOGGED_IN, gradesResult(current))]);
    const accounts: AccountConfig[] = [
      { id: 'STUDENT_A', credentials: null },
      { id: 'STUDENT_B', credentials }
    ];

    const outcomes = await runGradeChecks(context, accounts);

    expect(notifier.messages).toEqual([
      'WebSinu Grades agent started!',
      "WebSinu credentials missing for user 'STUDENT_A'. Skipping.",
      "Agent started checking for user 'STUDENT_B'.",
      'First grade check completed for STUDENT_B. Found 2 grades. Will notify on changes.',
      'All WebSinu grade checks completed!'
    ]);
    expect(notifier.sent[0].options).toEqual({ title: 'Agent Status', tags: ['robot'] });
    expect(notifier.sent[1].options).toEqual({ title: 'WebSinu Agent Error', tags: ['error', 'x'] });
    expect(notifier.sent[4].options).toEqual({ title: 'Agent Batch Complete', tags: ['checkmark', 'bell'] });
    expect(outcomes.map(outcome => outcome.status)).toEqual(['skipped', 'first-run']);
    expect(store.snapshots.get('STUDENT_B')).toEqual(current);
    expect(store.snapshots.has('STUDENT_A')).toBe(false);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('notifies new grades before changed grades and saves the current snapshot', async () => {
    const previous = [grade('Algebra liniara', '1', '9'), grade('Baze de date', '2', '8')];
    const current = [
      grade('Algebra liniara', '1', '9'),
      grade('Baze de date', '2', '10', '2024-06-12'),
      grade('Fizica', '2', '7', '2024-06-25')
    ];
    const client = fakeClient(LOGGED_IN, gradesResult(current));
    const { context, notifier, store } = setup([client]);
    store.snapshots.set('STUDENT_A', previous);

    const [outcome] = await runGradeChecks(context, [{ id: 'STUDENT_A', credentials }]);

    expect(notifier.messages.slice(2, 4)).toEqual([
      'New grade for STUDENT_A: Fizica is 7 (on 2024-06-25)',
      'Grade for STUDENT_A: Baze de date changed from 8 to 10 (on 2024-06-12)'
    ]);
    expect(notifier.sent[2].options).toEqual({ title: 'New WebSinu Grade for STUDENT_A!', tags: ['new', 'sparkles'] });
    expect(notifier.sent[3].options).toEqual({ title: 'WebSinu Grade Changed for STUDENT_A!', tags: ['changed', 'warning'] });
    expect(outcome).toEqual({
      accountId: 'STUDENT_A',
      status: 'checked',
      newCount: 1,
      changedCount: 1,
      saved: true
    });
    expect(store.snapshots.get('STUDENT_A')).toEqual(current);
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it('sends a single all-good message when nothing changed', async () => {
    const records = [grade('Algebra liniara', '1', '9')];
    const { context, notifier, store } = setup([fakeClient(LOGGED_IN, gradesResult(records))]);
    store.snapshots.set('STUDENT_A', records);

    await runGradeChecks(context, [{ id: 'STUDENT_A', credentials }]);

    expect(notifier.messages[2]).toBe('No new grades found for STUDENT_A. All good.');
    expect(notifier.sent[2].options).toEqual({ tags: ['check'] });
    expect(notifier.messages).toHaveLength(4);
  });

  it('reports a failed login and moves on to the next account', async () => {
    const error = new AuthError('Login rejected', { status: 200, excerpt: '<html></html>' });
    const rejected = fakeClient({ success: false, message: error.message, error }, gradesResult([]));
    const accepted = fakeClient(LOGGED_IN, gradesResult([grade('Fizica', '2', '7')]));
    const { context, notifier, store } = setup([rejected, accepted]);

    const outcomes = await runGradeChecks(context, [
      { id: 'STUDENT_A', credentials },
      { id: 'STUDENT_B', credentials }
    ]);

    expect(notifier.messages[2]).toBe('WebSinu login failed for STUDENT_A (auth: credentials rejected). Check logs.');
    expect(notifier.sent[2].options).toEqual({ tags: ['error', 'x'] });
    expect(rejected.getGrades).not.toHaveBeenCalled();
    expect(rejected.close).toHaveBeenCalledTimes(1);
    expect(outcomes[0]).toMatchObject({ status: 'login-failed', error });
    expect(outcomes[1].status).toBe('first-run');
    expect(store.snapshots.has('STUDENT_A')).toBe(false);
  });

  it('leaves the snapshot untouched when no grades could be extracted', async () => {
    const previous = [grade('Algebra liniara', '1', '9')];
    const { context, notifier, store } = setup([fakeClient(LOGGED_IN, gradesResult([]))]);
    store.snapshots.set('STUDENT_A', previous);

    const [outcome] = await runGradeChecks(context, [{ id: 'STUDENT_A', credentials }]);

    expect(notifier.messages[2]).toBe(
      'Failed to retrieve grades for STUDENT_A (extraction: grades link or table not found). Check logs.'
    );
    expect(notifier.sent[2].options).toEqual({ tags: ['warning', 'exclamation'] });
    expect(outcome.status).toBe('fetch-failed');
    expect(outcome.saved).toBe(false);
    expect(store.snapshots.get('STUDENT_A')).toEqual(previous);
  });

  it('names the failure category of each failed login', async () => {
    const errors: PortalError[] = [
      new AuthError('Login rejected', { status: 200, excerpt: '' }),
      new ProtocolError('Auto-submit page has no sid field', { stage: 'two-hop', snippet: '' }),
      new NetworkError('Unexpected status 503 during login', { status: 503 })
    ];
    const clients = errors.map(error => fakeClient({ success: false, message: error.message, error }, gradesResult([])));
    const { context, notifier } = setup(clients);

    await runGradeChecks(
      context,
      ['S0', 'S1', 'S2'].map(id => ({ id, credentials }))
    );

    expect(notifier.messages.filter(message => message.startsWith('WebSinu login failed'))).toEqual([
      'WebSinu login failed for S0 (auth: credentials rejected). Check logs.',
      'WebSinu login failed for S1 (protocol: portal page shape changed). Check logs.',
      'WebSinu login failed for S2 (network: portal unreachable or returned an error status). Check logs.'
    ]);
  });

  it('names the failure category of each failed grades request', async () => {
    const failed = (error: PortalError): PortalGradesResult => ({
      success: false,
      message: error.message,
      data: [],
      timestamp: new Date(),
      error
    });
    const clients = [
      fakeClient(LOGGED_IN, failed(new ExtractionError('No link calling NoteSesiuneaCurenta on the grade selection page'))),
      fakeClient(LOGGED_IN, failed(new NetworkError('Unexpected status 502 during grades view', { status: 502 }))),
      fakeClient(LOGGED_IN, failed(new AuthError('Portal refused grades view with status 403', { status: 403, excerpt: '' })))
    ];
    const { context, notifier } = setup(clients);

    await runGradeChecks(
      context,
      ['S0', 'S1', 'S2'].map(id => ({ id, credentials }))
    );

    expect(notifier.messages.filter(message => message.startsWith('Failed to retrieve grades'))).toEqual([
      'Failed to retrieve grades for S0 (extraction: grades link or table not found). Check logs.',
      'Failed to retrieve grades for S1 (network: portal unreachable or returned an error status). Check logs.',
      'Failed to retrieve grades for S2 (auth: credentials rejected). Check logs.'
    ]);
  });

  it('keeps going when the notifier fails', async () => {
    const { context, store } = setup([fakeClient(LOGGED_IN, gradesResult([grade('Fizica', '2', '7')]))]);
    context.notifier = { notify: vi.fn(async () => { throw new Error('ntfy unreachable'); }) };

    const [outcome] = await runGradeChecks(context, [{ id: 'STUDENT_A', credentials }]);

    expect(outcome.status).toBe('first-run');
    expect(store.snapshots.get('STUDENT_A')).toHaveLength(1);
  });

  it('reports an unsaved snapshot after notifications were sent', async () => {
    const previous = [grade('Algebra liniara', '1', '9')];
    const current = [grade('Algebra liniara', '1', '10')];
    const { context, notifier, store } = setup([fakeClient(LOGGED_IN, gradesResult(current))]);
    store.snapshots.set('STUDENT_A', previous);
    store.save = vi.fn(async (accountId: string) => {
      throw new PersistenceError('disk full', { accountId });
    });

    const [outcome] = await runGradeChecks(context, [{ id: 'STUDENT_A', credentials }]);

    expect(notifier.messages[2]).toBe('Grade for STUDENT_A: Algebra liniara changed from 9 to 10 (on 2024-06-20)');
    expect(outcome).toMatchObject({ status: 'checked', changedCount: 1, saved: false });
    expect(store.snapshots.get('STUDENT_A')).toEqual(previous);
  });

  it('does not pause after the last account', async () => {
    const { context, sleep } = setup([fakeClient(LOGGED_IN, gradesResult([grade('Fizica', '2', '7')]))]);

    await runGradeChecks(context, [{ id: 'STUDENT_A', credentials }]);

    expect(sleep).not.toHaveBeenCalled();
  });
});
