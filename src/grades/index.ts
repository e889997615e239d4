/**
 * Grade Record Model
 *
 * The shape of one row of the "current session grades" table, and the
 * identity key used to match rows across runs.
 *
 * Identity is (subject, year, semester). It is not unique in the strict
 * sense (a retaken course can repeat it) but each comparison treats two
 * records with the same key as the same logical grade. Only `grade` is
 * compared; `type` and `date` are descriptive.
 *
 * @example
 * ```typescript
 * const record = createGradeRecord({
 *   year: '2', semester: '1', subject: 'Baze de date',
 *   type: 'Examen', date: '2024-01-22', grade: '9'
 * });
 * gradeKey(record); // '["Baze de date","2","1"]'
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export interface GradeRecord {
  readonly year: string;
  readonly semester: string;
  readonly subject: string;
  readonly type: string;
  readonly date: string;
  readonly grade: string;
}

/** A grade whose value differs from the one in the previous snapshot */
export interface ChangeEntry {
  readonly oldGrade: string;
  readonly newGrade: string;
  readonly subject: string;
  readonly year: string;
  readonly semester: string;
  /** Date of the current record */
  readonly date: string;
}

/** Column order of the grades table on the portal */
export const GRADE_COLUMNS = ['year', 'semester', 'subject', 'type', 'date', 'grade'] as const;

export type GradeField = (typeof GRADE_COLUMNS)[number];

// ============================================================================
// Normalization
// ============================================================================

const NBSP = /\u00a0/g;

/**
 * Collapse non-breaking spaces to regular spaces and trim.
 */
export function normalizeSubject(subject: string): string {
  return subject.replace(NBSP, ' ').trim();
}

/**
 * Build an immutable record, trimming every field and normalizing the
 * subject.
 */
export function createGradeRecord(fields: Record<GradeField, string>): GradeRecord {
  return Object.freeze({
    year: fields.year.trim(),
    semester: fields.semester.trim(),
    subject: normalizeSubject(fields.subject),
    type: fields.type.trim(),
    date: fields.date.trim(),
    grade: fields.grade.trim()
  });
}

// ============================================================================
// Identity
// ============================================================================

/**
 * Identity key of a record: the (subject, year, semester) tuple as a JSON
 * array, so no field content can make two tuples share a key. The subject
 * is normalized first so NBSP variants share a key.
 */
export function gradeKey(record: Pick<GradeRecord, 'subject' | 'year' | 'semester'>): string {
  return JSON.stringify([normalizeSubject(record.subject), record.year, record.semester]);
}

// ============================================================================
// Snapshot validation
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check that a parsed JSON value has every record field as a string.
 */
export function isGradeRecord(value: unknown): value is GradeRecord {
  if (!isObject(value)) return false;
  return GRADE_COLUMNS.every(field => typeof value[field] === 'string');
}

/**
 * Validate a parsed snapshot. Returns null when the value is not an array
 * of grade records.
 */
export function parseSnapshot(value: unknown): GradeRecord[] | null {
  if (!Array.isArray(value)) return null;
  const records: GradeRecord[] = [];
  for (const item of value) {
    if (!isGradeRecord(item)) return null;
    records.push(createGradeRecord(item));
  }
  return records;
}
