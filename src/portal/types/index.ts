// Centralized types and wire constants for the WebSinu portal

import type { CookieFetch } from '../../shared/utils/http-client.js';
import type { HandshakePath, PortalError } from '../../shared/errors.js';
import type { GradeRecord } from '../../grades/index.js';

export interface PortalCredentials {
  username: string;
  password: string;
}

export interface PortalConfig {
  /** Base URL of the grades application, ending in "/" */
  baseUrl?: string;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
}

export const WEBSINU_DEFAULT_BASE_URL = 'https://websinu.utcluj.ro/note/';

export const WEBSINU_PAGES = {
  LOGIN: 'default.asp',
  ROLES: 'roluri.asp'
} as const;

export const WEBSINU_MARKERS = {
  /** Exact <title> of the grade selection page */
  LANDING_TITLE: 'Note din sesiunea curenta',
  /** Script statement on the auto-submit page of the two-hop login */
  AUTO_SUBMIT_SCRIPT: 'document.frmData.submit()',
  /** Name of the form carrying the session token */
  FORM_NAME: 'frmData',
  /** Function called by the "Vizualizare note" link */
  GRADES_FUNCTION: 'NoteSesiuneaCurenta',
  /** Class on the <table> that holds the grade rows */
  GRADES_TABLE_CLASS: 'table'
} as const;

// ============================================================================
// Request payloads, one per endpoint
// ============================================================================

/** POST default.asp */
export type LoginForm = {
  readonly hidSelfSubmit: 'default.asp';
  readonly username: string;
  readonly password: string;
  readonly submit: ' Intra ';
};

/** POST roluri.asp, second hop of the redirect login */
export type RolesHandshakeForm = {
  readonly hidSelfSubmit: string;
  readonly sid: string;
  readonly hidOperation: '';
  readonly hidNume_Facultate: '';
  readonly hidNume_Specializare: '';
};

/** POST roluri.asp, renders the grades table */
export type GradesViewForm = {
  readonly hidSelfSubmit: 'roluri.asp';
  readonly sid: string;
  readonly hidOperation: 'N';
  readonly hidNume_Facultate: string;
  readonly hidNume_Specializare: string;
};

export function buildLoginForm(credentials: PortalCredentials): LoginForm {
  return {
    hidSelfSubmit: 'default.asp',
    username: credentials.username,
    password: credentials.password,
    submit: ' Intra '
  };
}

export function buildRolesHandshakeForm(sid: string, hidSelfSubmit: string): RolesHandshakeForm {
  return {
    hidSelfSubmit,
    sid,
    hidOperation: '',
    hidNume_Facultate: '',
    hidNume_Specializare: ''
  };
}

export function buildGradesViewForm(sid: string, program: StudyProgram): GradesViewForm {
  return {
    hidSelfSubmit: 'roluri.asp',
    sid,
    hidOperation: 'N',
    hidNume_Facultate: program.faculty,
    hidNume_Specializare: program.specialization
  };
}

// ============================================================================
// Session and results
// ============================================================================

/** Arguments of the NoteSesiuneaCurenta(faculty, specialization) link */
export interface StudyProgram {
  faculty: string;
  specialization: string;
}

/**
 * Authenticated portal context for one account. Lives until the account
 * has been processed; never persisted.
 */
export interface PortalSession {
  readonly http: CookieFetch;
  readonly sid: string;
  readonly landingHtml: string;
  readonly path: HandshakePath;
}

export interface PortalLoginResult {
  success: boolean;
  message: string;
  path?: HandshakePath;
  error?: PortalError;
}

export interface PortalGradesResult {
  success: boolean;
  message: string;
  data: GradeRecord[];
  timestamp: Date;
  error?: PortalError;
}
