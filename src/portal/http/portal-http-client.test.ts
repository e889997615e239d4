import { describe, it, expect, vi } from 'vitest';
import { PortalHttpClient, findStudyProgram } from './portal-http-client.js';
import { AuthError, ExtractionError, NetworkError, ProtocolError } from '../../shared/errors.js';
import { Logger } from '../../shared/utils/logger.js';
import { createFakeFetch, htmlResponse } from '../../test/fake-fetch.js';
import {
  GRADES_PAGE,
  LANDING_PAGE,
  LANDING_PAGE_WITHOUT_SID,
  LOGIN_REJECTED_PAGE,
  REDIRECT_PAGE,
  REDIRECT_PAGE_WITHOUT_SELF_SUBMIT,
  REDIRECT_PAGE_WITHOUT_SID,
  UNEXPECTED_TITLE_PAGE
} from '../../test/portal-pages.js';

const credentials = { username: 'student01', password: 'test-secret' };
const LOGIN_URL = 'https://websinu.utcluj.ro/note/default.asp';
const ROLES_URL = 'https://websinu.utcluj.ro/note/roluri.asp';

function clientWith(responses: Array<Response | Error>) {
  const fake = createFakeFetch(responses);
  const client = new PortalHttpClient({
    fetch: fake.fetch,
    logger: new Logger({ level: 'silent' })
  });
  return { client, requests: fake.requests };
}

describe('PortalHttpClient.authenticate', () => {
  it('posts the login form with the fixed protocol fields', async () => {
    const { client, requests } = clientWith([htmlResponse(LANDING_PAGE)]);

    await client.authenticate(credentials);

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(LOGIN_URL);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].body).toBe('hidSelfSubmit=default.asp&username=student01&password=test-secret&submit=+Intra+');
    expect(requests[0].headers.get('content-type')).toBe('application/x-www-form-urlencoded');
  });

  it('takes the direct path when the login response is the landing page', async () => {
    const { client } = clientWith([htmlResponse(LANDING_PAGE)]);

    const session = await client.authenticate(credentials);

    expect(session.path).toBe('direct');
    expect(session.sid).toBe('SID-direct-123');
    expect(session.landingHtml).toBe(LANDING_PAGE);
  });

  it('follows the two-hop redirect with the sid from the auto-submit page', async () => {
    const { client, requests } = clientWith([htmlResponse(REDIRECT_PAGE), htmlResponse(LANDING_PAGE)]);

    const session = await client.authenticate(credentials);

    expect(session.path).toBe('two-hop');
    expect(session.sid).toBe('SID-hop-456');
    expect(session.landingHtml).toBe(LANDING_PAGE);
    expect(requests[1].url).toBe(ROLES_URL);
    expect(requests[1].body).toBe(
      'hidSelfSubmit=roluri.asp&sid=SID-hop-456&hidOperation=&hidNume_Facultate=&hidNume_Specializare='
    );
  });

  it('falls back to roluri.asp when the redirect form has no hidSelfSubmit', async () => {
    const { client, requests } = clientWith([htmlResponse(REDIRECT_PAGE_WITHOUT_SELF_SUBMIT), htmlResponse(LANDING_PAGE)]);

    await client.authenticate(credentials);

    expect(new URLSearchParams(requests[1].body).get('hidSelfSubmit')).toBe('roluri.asp');
    expect(new URLSearchParams(requests[1].body).get('sid')).toBe('SID-hop-789');
  });

  it('fails with a two-hop ProtocolError when the redirect page has no sid', async () => {
    const { client, requests } = clientWith([htmlResponse(REDIRECT_PAGE_WITHOUT_SID)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ kind: 'protocol', stage: 'two-hop' });
    expect(requests).toHaveLength(1);
  });

  it('fails with a two-hop ProtocolError when the redirect lands on another page', async () => {
    const { client } = clientWith([htmlResponse(REDIRECT_PAGE), htmlResponse(UNEXPECTED_TITLE_PAGE)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ stage: 'two-hop', snippet: UNEXPECTED_TITLE_PAGE });
  });

  it('fails with a direct ProtocolError when the landing page has no sid', async () => {
    const { client } = clientWith([htmlResponse(LANDING_PAGE_WITHOUT_SID)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ stage: 'direct' });
  });

  it('fails with an AuthError carrying status and excerpt when the login is rejected', async () => {
    const { client } = clientWith([htmlResponse(LOGIN_REJECTED_PAGE)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ kind: 'auth', status: 200, excerpt: LOGIN_REJECTED_PAGE });
  });

  it('truncates the AuthError excerpt to 500 characters', async () => {
    const longPage = `<html><head><title>Autentificare</title></head><body>${'x'.repeat(1000)}</body></html>`;
    const { client } = clientWith([htmlResponse(longPage)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    if (error instanceof AuthError) {
      expect(error.excerpt).toBe(longPage.substring(0, 500));
    }
  });

  it('treats a 403 as AuthError', async () => {
    const { client } = clientWith([htmlResponse('Forbidden', 403)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'auth', status: 403 });
  });

  it('treats other error statuses as NetworkError', async () => {
    const { client } = clientWith([htmlResponse('Server Error', 500)]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ kind: 'network', status: 500 });
  });

  it('wraps transport failures in NetworkError', async () => {
    const { client } = clientWith([new Error('getaddrinfo ENOTFOUND websinu.utcluj.ro')]);

    const error = await client.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: `POST ${LOGIN_URL} failed: getaddrinfo ENOTFOUND websinu.utcluj.ro`
    });
  });

  it('resolves endpoints against a custom base URL', async () => {
    const fake = createFakeFetch([htmlResponse(LANDING_PAGE)]);
    const client = new PortalHttpClient({
      baseUrl: 'https://portal.example.test/note/',
      fetch: fake.fetch,
      logger: new Logger({ level: 'silent' })
    });

    await client.authenticate(credentials);

    expect(fake.requests[0].url).toBe('https://portal.example.test/note/default.asp');
  });
});

describe('PortalHttpClient.fetchGradesPage', () => {
  it('posts the grades view form with the sid and the study program', async () => {
    const { client, requests } = clientWith([htmlResponse(LANDING_PAGE), htmlResponse(GRADES_PAGE)]);

    const session = await client.authenticate(credentials);
    const html = await client.fetchGradesPage(session);

    expect(html).toBe(GRADES_PAGE);
    expect(requests[1].url).toBe(ROLES_URL);
    expect(requests[1].body).toBe(
      'hidSelfSubmit=roluri.asp&sid=SID-direct-123&hidOperation=N' +
        '&hidNume_Facultate=Facultatea+de+Automatica+si+Calculatoare&hidNume_Specializare=Calculatoare'
    );
  });

  it('writes the received page to the debug log', async () => {
    const fake = createFakeFetch([htmlResponse(LANDING_PAGE), htmlResponse(GRADES_PAGE)]);
    const logger = new Logger({ level: 'silent' });
    const debug = vi.spyOn(logger, 'debug');
    const client = new PortalHttpClient({ fetch: fake.fetch, logger });

    const session = await client.authenticate(credentials);
    await client.fetchGradesPage(session);

    expect(debug).toHaveBeenCalledWith(`Grades page received (${GRADES_PAGE.length} chars):\n${GRADES_PAGE}`);
  });

  it('uses the sid obtained from the two-hop login', async () => {
    const { client, requests } = clientWith([
      htmlResponse(REDIRECT_PAGE),
      htmlResponse(LANDING_PAGE),
      htmlResponse(GRADES_PAGE)
    ]);

    const session = await client.authenticate(credentials);
    await client.fetchGradesPage(session);

    expect(new URLSearchParams(requests[2].body).get('sid')).toBe('SID-hop-456');
  });

  it('fails with NetworkError on an error status', async () => {
    const { client } = clientWith([htmlResponse(LANDING_PAGE), htmlResponse('Bad Gateway', 502)]);

    const session = await client.authenticate(credentials);
    const error = await client.fetchGradesPage(session).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'network', status: 502 });
  });
});

describe('findStudyProgram', () => {
  it('reads faculty and specialization from the grades link', () => {
    expect(findStudyProgram(LANDING_PAGE)).toEqual({
      faculty: 'Facultatea de Automatica si Calculatoare',
      specialization: 'Calculatoare'
    });
  });

  it('accepts a link that runs more statements after the call', () => {
    const html = `<a href="javascript: NoteSesiuneaCurenta('Facultatea A', 'Spec B'); void(0);">Vizualizare note</a>`;
    expect(findStudyProgram(html)).toEqual({ faculty: 'Facultatea A', specialization: 'Spec B' });
  });

  it('fails with ExtractionError when the link is missing', () => {
    expect(() => findStudyProgram(LANDING_PAGE_WITHOUT_SID)).toThrow(ExtractionError);
  });

  it('fails with ExtractionError carrying the href when the arguments cannot be parsed', () => {
    const html = `<a href="javascript: NoteSesiuneaCurenta('Facultatea de Constructii')">Vizualizare note</a>`;

    let caught: unknown;
    try {
      findStudyProgram(html);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExtractionError);
    expect(caught).toMatchObject({ snippet: "javascript: NoteSesiuneaCurenta('Facultatea de Constructii')" });
  });
});
