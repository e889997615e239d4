/**
 * PortalClient - per-account facade
 *
 * Wraps {@link PortalHttpClient} with result objects so callers can
 * branch on `success` instead of catching. One instance serves one
 * account: `login()`, then `getGrades()`, then `close()` to drop the
 * session cookies.
 *
 * @example
 * ```typescript
 * const client = createPortalClient({ username: 'student', password: 'test-secret' });
 *
 * const login = await client.login();
 * if (login.success) {
 *   const grades = await client.getGrades();
 *   console.log(grades.data);
 * }
 * await client.close();
 * ```
 */

import { PortalHttpClient, type PortalHttpConfig } from './http/portal-http-client.js';
import { extractGrades } from './http/grades-parser.js';
import { toPortalError } from '../shared/errors.js';
import { createLogger, type Logger } from '../shared/utils/logger.js';
import type { PortalCredentials, PortalGradesResult, PortalLoginResult, PortalSession } from './types/index.js';

export type PortalClientConfig = PortalHttpConfig;

export class PortalClient {
  private credentials: PortalCredentials;
  private httpClient: PortalHttpClient;
  private logger: Logger;
  private session: PortalSession | null = null;

  constructor(credentials: PortalCredentials, config: PortalClientConfig = {}) {
    this.credentials = credentials;
    this.logger = config.logger ?? createLogger('PortalClient');
    this.httpClient = new PortalHttpClient({ ...config, logger: this.logger });
  }

  /**
   * Run the login handshake
   */
  async login(): Promise<PortalLoginResult> {
    try {
      this.session = await this.httpClient.authenticate(this.credentials);
      return {
        success: true,
        message: `Authenticated via ${this.session.path} login`,
        path: this.session.path
      };
    } catch (error: unknown) {
      const portalError = toPortalError(error);
      return {
        success: false,
        message: portalError.message,
        error: portalError
      };
    }
  }

  /**
   * Fetch and extract the current session grades
   */
  async getGrades(): Promise<PortalGradesResult> {
    if (!this.session) {
      return {
        success: false,
        message: 'Not logged in. Call login() first.',
        data: [],
        timestamp: new Date()
      };
    }

    try {
      const html = await this.httpClient.fetchGradesPage(this.session);
      const data = extractGrades(html, this.logger);
      return {
        success: true,
        message: `Extracted ${data.length} grades`,
        data,
        timestamp: new Date()
      };
    } catch (error: unknown) {
      const portalError = toPortalError(error);
      return {
        success: false,
        message: portalError.message,
        data: [],
        timestamp: new Date(),
        error: portalError
      };
    }
  }

  isAuthenticated(): boolean {
    return this.session !== null;
  }

  /**
   * Drop the session and its cookies
   */
  async close(): Promise<void> {
    if (this.session) {
      await this.session.http.clearCookies();
      this.session = null;
    }
    this.logger.debug('Client closed');
  }
}

/**
 * Create a new PortalClient instance
 */
export function createPortalClient(credentials: PortalCredentials, config?: PortalClientConfig): PortalClient {
  return new PortalClient(credentials, config);
}
