import type { StudentRecord, ScoreTable } from '../lib/types';

export function student(
  id: string,
  name: string | null,
  scores: Record<string, number | null>,
  attributes: Record<string, string> = {}
): StudentRecord {
  return { id, name, attributes, scores: new Map(Object.entries(scores)) };
}

export function table(subjects: string[], students: StudentRecord[]): ScoreTable {
  return { subjects, students };
}

// Math=[85,40,missing], Physics=[60,30,70]
export function sampleTable(): ScoreTable {
  return table(
    ['Math', 'Physics'],
    [
      student('S1', 'Alice', { Math: 85, Physics: 60 }),
      student('S2', 'Bob', { Math: 40, Physics: 30 }),
      student('S3', null, { Math: null, Physics: 70 }),
    ]
  );
}
