/**
 * WebSinu Grades Monitor
 *
 * Logs into the WebSinu student portal over plain HTTP, reads the current
 * session grades and reports what changed since the last run.
 *
 * @example
 * ```typescript
 * import { createPortalClient, diffGrades } from 'websinu-grades-monitor';
 *
 * const client = createPortalClient({ username: 'student', password: 'test-secret' });
 * await client.login();
 * const { data } = await client.getGrades();
 * const { newRecords, changedRecords } = diffGrades(previous, data);
 * await client.close();
 * ```
 */

// ============================================================================
// Portal (login handshake, grades page, extraction)
// ============================================================================

export {
  PortalClient,
  createPortalClient,
  type PortalClientConfig,
} from './portal/client.js';

export {
  PortalHttpClient,
  createPortalHttpClient,
  findStudyProgram,
  extractGrades,
  cellsToRecord,
  parsePageTitle,
  isLandingPage,
  isAutoSubmitPage,
  parseSessionForm,
  findScriptLinkHref,
  parseScriptCall,
} from './portal/http/index.js';

export type {
  PortalHttpConfig,
  SessionFormFields,
  ScriptCallResult,
} from './portal/http/index.js';

export {
  WEBSINU_DEFAULT_BASE_URL,
  WEBSINU_PAGES,
  WEBSINU_MARKERS,
  buildLoginForm,
  buildRolesHandshakeForm,
  buildGradesViewForm,
} from './portal/types/index.js';

export type {
  PortalCredentials,
  PortalConfig,
  PortalSession,
  PortalLoginResult,
  PortalGradesResult,
  StudyProgram,
  LoginForm,
  RolesHandshakeForm,
  GradesViewForm,
} from './portal/types/index.js';

// ============================================================================
// Grades model and diff
// ============================================================================

export {
  GRADE_COLUMNS,
  createGradeRecord,
  normalizeSubject,
  gradeKey,
  isGradeRecord,
  parseSnapshot,
  type GradeRecord,
  type ChangeEntry,
  type GradeField,
} from './grades/index.js';

export { diffGrades, hasChanges, type GradeDiff } from './diff/index.js';

// ============================================================================
// Collaborators
// ============================================================================

export {
  NtfyNotifier,
  createNtfyNotifier,
  DEFAULT_NOTIFICATION_TITLE,
  type Notifier,
  type NotifyOptions,
  type NotifyResult,
  type NtfyConfig,
} from './notify/ntfy.js';

export {
  FileSnapshotStore,
  createFileSnapshotStore,
  type SnapshotStore,
  type FileSnapshotStoreConfig,
} from './store/snapshot-store.js';

export {
  runGradeChecks,
  checkAccount,
  SYNC_MESSAGES,
  FAILURE_CATEGORIES,
  type RunContext,
  type AccountConfig,
  type AccountOutcome,
  type AccountStatus,
  type GradesClient,
} from './sync/grades-sync.js';

// ============================================================================
// Shared Infrastructure
// ============================================================================

export {
  PortalError,
  NetworkError,
  AuthError,
  ProtocolError,
  ExtractionError,
  PersistenceError,
  ConfigError,
  isPortalError,
  toPortalError,
  type PortalErrorKind,
  type HandshakePath,
} from './shared/errors.js';

export { Logger, createLogger, type LogLevel, type LoggerConfig } from './shared/utils/logger.js';

export {
  CookieFetch,
  createCookieFetch,
  type HttpClientConfig,
  type HttpResult,
  type FormFields,
  type FetchLike,
} from './shared/utils/http-client.js';
