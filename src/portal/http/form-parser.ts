/**
 * WebSinu Page Parser
 *
 * Cheerio helpers for the handful of markers the login flow relies on:
 * the page title, the auto-submit redirect page, the `frmData` form that
 * carries the session token, and the `javascript:` link that opens the
 * grades view.
 */

import * as cheerio from 'cheerio';
import { WEBSINU_MARKERS, WEBSINU_PAGES } from '../types/index.js';

export interface SessionFormFields {
  /** Hidden `sid` value, null when the input is missing or empty */
  sid: string | null;
  /** Hidden `hidSelfSubmit` value, null when the input is missing */
  hidSelfSubmit: string | null;
}

/**
 * Text of the first <title>, or null when the page has none.
 */
export function parsePageTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const title = $('title').first();
  return title.length > 0 ? title.text() : null;
}

/**
 * True when the title is exactly the grade selection page title.
 */
export function isLandingPage(html: string): boolean {
  return parsePageTitle(html) === WEBSINU_MARKERS.LANDING_TITLE;
}

/**
 * True for the intermediate page that auto-submits `frmData` to roluri.asp.
 */
export function isAutoSubmitPage(html: string): boolean {
  return html.includes(WEBSINU_MARKERS.AUTO_SUBMIT_SCRIPT) && html.includes(WEBSINU_PAGES.ROLES);
}

/**
 * Hidden fields of `<form name="frmData" action="roluri.asp">`, or null
 * when the form is not on the page.
 */
export function parseSessionForm(html: string): SessionFormFields | null {
  const $ = cheerio.load(html);
  const form = $(`form[name="${WEBSINU_MARKERS.FORM_NAME}"][action="${WEBSINU_PAGES.ROLES}"]`).first();

  if (form.length === 0) {
    return null;
  }

  const sid = form.find('input[name="sid"]').first().attr('value');
  const selfSubmitInput = form.find('input[name="hidSelfSubmit"]').first();

  return {
    sid: sid ? sid : null,
    hidSelfSubmit: selfSubmitInput.length > 0 ? selfSubmitInput.attr('value') ?? '' : null
  };
}

const SCRIPT_SCHEME = /^\s*javascript:\s*/i;

/**
 * href of the first anchor whose target is a `javascript:` call of
 * `functionName`.
 */
export function findScriptLinkHref(html: string, functionName: string): string | null {
  const $ = cheerio.load(html);
  const callPattern = new RegExp(`^${functionName}\\b`);

  let found: string | null = null;
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    const scheme = href ? SCRIPT_SCHEME.exec(href) : null;
    if (href && scheme && callPattern.test(href.substring(scheme[0].length))) {
      found = href;
      return false;
    }
    return undefined;
  });

  return found;
}

// ============================================================================
// Script call grammar
// ============================================================================
//
//   call   := ["javascript:"] ws IDENT ws "(" ws STRING ws "," ws STRING ws ")" rest
//   STRING := "'" chars "'" | '"' chars '"'      (backslash escapes the next char)
//   IDENT  := [A-Za-z_$][A-Za-z0-9_$]*
//
// `rest` (`; void(0);` and the like) is not inspected.

export type ScriptCallResult =
  | { ok: true; functionName: string; args: [string, string] }
  | { ok: false; reason: string; position: number };

class ScriptCallParseError extends Error {
  constructor(readonly reason: string, readonly position: number) {
    super(`${reason} at ${position}`);
  }
}

class ScriptCallCursor {
  private pos = 0;

  constructor(private readonly source: string) {}

  get position(): number {
    return this.pos;
  }

  skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }

  tryConsume(literal: string, ignoreCase = false): boolean {
    const slice = this.source.substring(this.pos, this.pos + literal.length);
    const matches = ignoreCase ? slice.toLowerCase() === literal.toLowerCase() : slice === literal;
    if (matches) {
      this.pos += literal.length;
    }
    return matches;
  }

  expect(literal: string): void {
    this.skipWhitespace();
    if (!this.tryConsume(literal)) {
      throw new ScriptCallParseError(`expected "${literal}"`, this.pos);
    }
  }

  identifier(): string {
    this.skipWhitespace();
    const match = /^[A-Za-z_$][A-Za-z0-9_$]*/.exec(this.source.substring(this.pos));
    if (!match) {
      throw new ScriptCallParseError('expected function name', this.pos);
    }
    this.pos += match[0].length;
    return match[0];
  }

  quotedString(): string {
    this.skipWhitespace();
    const quote = this.source[this.pos];
    if (quote !== "'" && quote !== '"') {
      throw new ScriptCallParseError('expected quoted string', this.pos);
    }
    const start = this.pos;
    this.pos++;

    let value = '';
    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      if (char === '\\' && this.pos + 1 < this.source.length) {
        value += this.source[this.pos + 1];
        this.pos += 2;
        continue;
      }
      if (char === quote) {
        this.pos++;
        return value;
      }
      value += char;
      this.pos++;
    }
    throw new ScriptCallParseError('unterminated string', start);
  }
}

/**
 * Parse a `javascript:` link target of the form `name('a', 'b')`.
 * Both arguments are trimmed.
 */
export function parseScriptCall(source: string, expectedName: string): ScriptCallResult {
  const cursor = new ScriptCallCursor(source);

  try {
    cursor.skipWhitespace();
    cursor.tryConsume('javascript:', true);

    const functionName = cursor.identifier();
    if (functionName !== expectedName) {
      return { ok: false, reason: `expected call to ${expectedName}, found ${functionName}`, position: 0 };
    }

    cursor.expect('(');
    const first = cursor.quotedString();
    cursor.expect(',');
    const second = cursor.quotedString();
    cursor.expect(')');

    return { ok: true, functionName, args: [first.trim(), second.trim()] };
  } catch (error) {
    if (error instanceof ScriptCallParseError) {
      return { ok: false, reason: error.reason, position: error.position };
    }
    throw error;
  }
}
