/**
 * Grades table extraction
 *
 * A row belongs to the grades table when it has exactly six direct <td>
 * children and its nearest enclosing <table> carries the `table` class.
 * Every other piece of tabular markup on the page fails one of the two
 * tests. Rows come back in page order, without dedup or sorting.
 */

import * as cheerio from 'cheerio';
import { GRADE_COLUMNS, createGradeRecord, type GradeField, type GradeRecord } from '../../grades/index.js';
import { WEBSINU_MARKERS } from '../types/index.js';
import type { Logger } from '../../shared/utils/logger.js';

/**
 * Map cell texts onto record fields. Null when the row does not have one
 * value per column.
 */
export function cellsToRecord(cells: readonly string[]): GradeRecord | null {
  if (cells.length !== GRADE_COLUMNS.length) {
    return null;
  }

  const fields: Partial<Record<GradeField, string>> = {};
  GRADE_COLUMNS.forEach((column, index) => {
    fields[column] = cells[index];
  });

  const { year, semester, subject, type, date, grade } = fields;
  if (
    year === undefined ||
    semester === undefined ||
    subject === undefined ||
    type === undefined ||
    date === undefined ||
    grade === undefined
  ) {
    return null;
  }

  return createGradeRecord({ year, semester, subject, type, date, grade });
}

/**
 * Extract every grade row of the records page. Never throws. Header rows
 * (no <td>) are passed over silently; rows of the grades table with any
 * other cell count than six are skipped with a warning.
 */
export function extractGrades(html: string, logger?: Logger): GradeRecord[] {
  const $ = cheerio.load(html);
  const records: GradeRecord[] = [];

  $('tr').each((_, row) => {
    const $row = $(row);
    const cells = $row.children('td');
    if (cells.length === 0) {
      return;
    }

    const table = $row.closest('table');
    if (table.length === 0 || !table.hasClass(WEBSINU_MARKERS.GRADES_TABLE_CLASS)) {
      return;
    }

    const texts = cells.toArray().map(cell => $(cell).text().trim());
    const record = cellsToRecord(texts);
    if (!record) {
      logger?.warn(`Skipping grade row with ${texts.length} cells: ${texts.join(' | ')}`);
      return;
    }
    records.push(record);
  });

  if (records.length === 0) {
    logger?.warn('No grades found on the records page; the table layout may have changed');
  } else {
    logger?.debug(`Extracted ${records.length} grade rows`);
  }

  return records;
}
