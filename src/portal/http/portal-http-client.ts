/**
 * WebSinu HTTP Client
 *
 * Pure HTTP client for the WebSinu grades portal. Uses a cookie jar for
 * the ASP session and cheerio for HTML parsing.
 *
 * Authentication flow:
 * 1. POST `default.asp` - credentials plus the two fixed form fields
 * 2. Either
 *    - two-hop: the response is an auto-submit page carrying `frmData`
 *      with a hidden `sid`; POST it to `roluri.asp` to reach the landing
 *      page, or
 *    - direct: the response already is the landing page and `sid` is
 *      read from its `frmData` form
 * 3. Landing page title must be "Note din sesiunea curenta"
 *
 * Grades:
 * - Read faculty and specialization from the `NoteSesiuneaCurenta(...)`
 *   link on the landing page, then POST `roluri.asp` with `hidOperation=N`
 */

import { createCookieFetch, type CookieFetch, type FetchLike, type HttpResult } from '../../shared/utils/http-client.js';
import { AuthError, ExtractionError, NetworkError, ProtocolError } from '../../shared/errors.js';
import { excerpt } from '../../shared/utils/helpers.js';
import { createLogger, redactSensitive, truncateForLog, type Logger } from '../../shared/utils/logger.js';
import {
  findScriptLinkHref,
  isAutoSubmitPage,
  isLandingPage,
  parsePageTitle,
  parseScriptCall,
  parseSessionForm
} from './form-parser.js';
import {
  WEBSINU_DEFAULT_BASE_URL,
  WEBSINU_MARKERS,
  WEBSINU_PAGES,
  buildGradesViewForm,
  buildLoginForm,
  buildRolesHandshakeForm,
  type PortalConfig,
  type PortalCredentials,
  type PortalSession,
  type StudyProgram
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PortalHttpConfig extends PortalConfig {
  logger?: Logger;
  /** fetch implementation handed to the cookie client (default: global fetch) */
  fetch?: FetchLike;
}

const DIAGNOSTIC_EXCERPT_CHARS = 500;

// ============================================================================
// WebSinu HTTP Client
// ============================================================================

export class PortalHttpClient {
  private baseUrl: string;
  private timeout: number;
  private logger: Logger;
  private fetchImpl?: FetchLike;

  constructor(config: PortalHttpConfig = {}) {
    this.baseUrl = config.baseUrl ?? WEBSINU_DEFAULT_BASE_URL;
    this.timeout = config.timeout ?? 30000;
    this.logger = config.logger ?? createLogger('PortalHTTP');
    this.fetchImpl = config.fetch;
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  /**
   * Log in and return the authenticated session. Each call starts a fresh
   * cookie jar.
   *
   * @throws AuthError when the portal rejects the credentials
   * @throws ProtocolError when an expected form, token or title is missing
   * @throws NetworkError on transport failure or an unexpected status
   */
  async authenticate(credentials: PortalCredentials): Promise<PortalSession> {
    const http = createCookieFetch({
      timeout: this.timeout,
      logger: this.logger,
      fetch: this.fetchImpl
    });

    this.logger.info(`Logging in as ${truncateForLog(credentials.username)}...`);
    const loginForm = buildLoginForm(credentials);
    this.logger.debug('Login payload', redactSensitive(loginForm));

    const response = await http.postForm(this.url(WEBSINU_PAGES.LOGIN), loginForm);
    this.assertStatus(response, 'login');

    if (isAutoSubmitPage(response.html)) {
      this.logger.info('Detected JavaScript redirect page, following...');
      return this.completeTwoHop(http, response.html);
    }

    if (isLandingPage(response.html)) {
      this.logger.info('Logged in directly (no JavaScript redirect)');
      return this.completeDirect(http, response.html);
    }

    this.logger.debug(`Login response (first ${DIAGNOSTIC_EXCERPT_CHARS} chars):\n${excerpt(response.html, DIAGNOSTIC_EXCERPT_CHARS)}`);
    throw new AuthError(`Login rejected (status ${response.status}, title ${JSON.stringify(parsePageTitle(response.html))})`, {
      status: response.status,
      excerpt: excerpt(response.html, DIAGNOSTIC_EXCERPT_CHARS)
    });
  }

  private async completeTwoHop(http: CookieFetch, redirectHtml: string): Promise<PortalSession> {
    const form = parseSessionForm(redirectHtml);
    if (!form) {
      throw new ProtocolError('Auto-submit page has no frmData form posting to roluri.asp', {
        stage: 'two-hop',
        snippet: excerpt(redirectHtml, DIAGNOSTIC_EXCERPT_CHARS)
      });
    }
    if (!form.sid) {
      throw new ProtocolError('Auto-submit page has no sid field', {
        stage: 'two-hop',
        snippet: excerpt(redirectHtml, DIAGNOSTIC_EXCERPT_CHARS)
      });
    }

    this.logger.debug(`Intermediate sid: ${truncateForLog(form.sid, 4)}`);
    const handshake = buildRolesHandshakeForm(form.sid, form.hidSelfSubmit ?? WEBSINU_PAGES.ROLES);

    const response = await http.postForm(this.url(WEBSINU_PAGES.ROLES), handshake);
    this.assertStatus(response, 'roles handshake');

    if (!isLandingPage(response.html)) {
      throw new ProtocolError(
        `Redirect login finished but the page title is ${JSON.stringify(parsePageTitle(response.html))}, expected "${WEBSINU_MARKERS.LANDING_TITLE}"`,
        { stage: 'two-hop', snippet: excerpt(response.html, DIAGNOSTIC_EXCERPT_CHARS) }
      );
    }

    this.logger.info('Completed redirect login and reached the grade selection page');
    return { http, sid: form.sid, landingHtml: response.html, path: 'two-hop' };
  }

  private completeDirect(http: CookieFetch, landingHtml: string): PortalSession {
    const form = parseSessionForm(landingHtml);
    if (!form) {
      throw new ProtocolError('Landing page has no frmData form posting to roluri.asp', {
        stage: 'direct',
        snippet: excerpt(landingHtml, DIAGNOSTIC_EXCERPT_CHARS)
      });
    }
    if (!form.sid) {
      throw new ProtocolError('Landing page frmData form has no sid field', {
        stage: 'direct',
        snippet: excerpt(landingHtml, DIAGNOSTIC_EXCERPT_CHARS)
      });
    }

    this.logger.debug(`Landing page sid: ${truncateForLog(form.sid, 4)}`);
    return { http, sid: form.sid, landingHtml, path: 'direct' };
  }

  // ==========================================================================
  // Grades page
  // ==========================================================================

  /**
   * Read the study program from the landing page link and request the
   * grades view. Returns the raw records page.
   *
   * @throws ExtractionError when the grades link or its arguments are missing
   * @throws NetworkError on transport failure or an unexpected status
   */
  async fetchGradesPage(session: PortalSession): Promise<string> {
    const program = findStudyProgram(session.landingHtml);
    this.logger.info(`Found faculty: '${program.faculty}', specialization: '${program.specialization}'`);

    const response = await session.http.postForm(
      this.url(WEBSINU_PAGES.ROLES),
      buildGradesViewForm(session.sid, program)
    );
    this.assertStatus(response, 'grades view');

    this.logger.debug(`Grades page received (${response.html.length} chars):\n${response.html}`);
    return response.html;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private url(page: string): string {
    return new URL(page, this.baseUrl).toString();
  }

  private assertStatus(response: HttpResult, step: string): void {
    if (response.status >= 200 && response.status < 300) {
      return;
    }
    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Portal refused ${step} with status ${response.status}`, {
        status: response.status,
        excerpt: excerpt(response.html, DIAGNOSTIC_EXCERPT_CHARS)
      });
    }
    throw new NetworkError(`Unexpected status ${response.status} during ${step} (${response.url})`, {
      status: response.status
    });
  }
}

/**
 * Faculty and specialization from the `NoteSesiuneaCurenta('…', '…')`
 * link on the landing page.
 */
export function findStudyProgram(landingHtml: string): StudyProgram {
  const href = findScriptLinkHref(landingHtml, WEBSINU_MARKERS.GRADES_FUNCTION);
  if (!href) {
    throw new ExtractionError(`No link calling ${WEBSINU_MARKERS.GRADES_FUNCTION} on the grade selection page`);
  }

  const call = parseScriptCall(href, WEBSINU_MARKERS.GRADES_FUNCTION);
  if (!call.ok) {
    throw new ExtractionError(`Cannot parse ${WEBSINU_MARKERS.GRADES_FUNCTION} arguments: ${call.reason}`, {
      snippet: href
    });
  }

  const [faculty, specialization] = call.args;
  return { faculty, specialization };
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createPortalHttpClient(config?: PortalHttpConfig): PortalHttpClient {
  return new PortalHttpClient(config);
}
