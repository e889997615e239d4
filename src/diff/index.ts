/**
 * Grade snapshot diff
 *
 * Classifies each current record against the previous snapshot:
 * - key not seen before: new
 * - key seen with a different grade (exact, case-sensitive): changed
 * - otherwise: unchanged, nothing emitted
 *
 * Records that disappeared since the previous snapshot are not reported.
 * When the previous snapshot repeats a key, the last occurrence wins.
 */

import { gradeKey, type ChangeEntry, type GradeRecord } from '../grades/index.js';

export interface GradeDiff {
  newRecords: GradeRecord[];
  changedRecords: ChangeEntry[];
}

export function diffGrades(previous: readonly GradeRecord[], current: readonly GradeRecord[]): GradeDiff {
  const previousGrades = new Map<string, string>();
  for (const record of previous) {
    previousGrades.set(gradeKey(record), record.grade);
  }

  const newRecords: GradeRecord[] = [];
  const changedRecords: ChangeEntry[] = [];

  for (const record of current) {
    const oldGrade = previousGrades.get(gradeKey(record));

    if (oldGrade === undefined) {
      newRecords.push(record);
    } else if (oldGrade !== record.grade) {
      changedRecords.push({
        oldGrade,
        newGrade: record.grade,
        subject: record.subject,
        year: record.year,
        semester: record.semester,
        date: record.date
      });
    }
  }

  return { newRecords, changedRecords };
}

export function hasChanges(diff: GradeDiff): boolean {
  return diff.newRecords.length > 0 || diff.changedRecords.length > 0;
}
