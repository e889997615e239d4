/**
 * WebSinu HTTP Module
 *
 * Pure HTTP login and grade retrieval for the WebSinu portal.
 */

export {
  PortalHttpClient,
  createPortalHttpClient,
  findStudyProgram,
} from './portal-http-client.js';

export type { PortalHttpConfig } from './portal-http-client.js';

export { extractGrades, cellsToRecord } from './grades-parser.js';

export {
  parsePageTitle,
  isLandingPage,
  isAutoSubmitPage,
  parseSessionForm,
  findScriptLinkHref,
  parseScriptCall,
} from './form-parser.js';

export type { SessionFormFields, ScriptCallResult } from './form-parser.js';
