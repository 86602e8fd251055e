import type {
  AnalysisReport,
  Anomaly,
  RankedStudent,
  ScoreTable,
  StudentRecord,
  SubjectStatistics,
} from './types';
import type { PassPolicy } from './passPolicy';

const PERFECT_SCORE = 100;
const PERFECT_SCORE_SHARE = 0.3; // flagged when strictly above 30% of attempts
const LOW_PASS_RATE = 20;

type AttemptedScore = { student: StudentRecord; score: number };

function mean(values: number[]): number {
  return values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

/**
 * Scores a student actually sat, in subject order
 */
export function attemptedScores(student: StudentRecord, subjects: readonly string[]): number[] {
  const scores: number[] = [];
  subjects.forEach((subject) => {
    const score = student.scores.get(subject);
    if (score !== null && score !== undefined) scores.push(score);
  });
  return scores;
}

export function studentAverage(student: StudentRecord, subjects: readonly string[]): number | null {
  const scores = attemptedScores(student, subjects);
  return scores.length ? mean(scores) : null;
}

/**
 * A student passes all when every attempted score meets its subject threshold.
 * Students without any score never pass all.
 */
export function passedAllSubjects(
  student: StudentRecord,
  subjects: readonly string[],
  thresholdFor: (subject: string) => number
): boolean {
  let attempted = 0;
  for (const subject of subjects) {
    const score = student.scores.get(subject);
    if (score === null || score === undefined) continue;
    attempted += 1;
    if (score < thresholdFor(subject)) return false;
  }
  return attempted > 0;
}

function collectAttempts(table: ScoreTable, subject: string): AttemptedScore[] {
  const attempts: AttemptedScore[] = [];
  table.students.forEach((student) => {
    const score = student.scores.get(subject);
    if (score !== null && score !== undefined) attempts.push({ student, score });
  });
  return attempts;
}

function computeSubjectStats(subject: string, attempts: AttemptedScore[], threshold: number): SubjectStatistics {
  const scores = attempts.map((a) => a.score);
  const passed = scores.filter((s) => s >= threshold).length;
  const failed = scores.filter((s) => s < threshold).length;

  // First occurrence in table order wins on a shared maximum
  let top = attempts[0];
  let min = top.score;
  attempts.forEach((attempt) => {
    if (attempt.score > top.score) top = attempt;
    if (attempt.score < min) min = attempt.score;
  });

  return {
    subject,
    threshold,
    attempted: scores.length,
    passed,
    failed,
    passRate: (passed / scores.length) * 100,
    failRate: (failed / scores.length) * 100,
    mean: mean(scores),
    max: top.score,
    min,
    topper: { id: top.student.id, name: top.student.name, score: top.score },
  };
}

export function detectSubjectAnomalies(subject: string, scores: number[], threshold: number): Anomaly[] {
  if (scores.length === 0) {
    return [
      {
        kind: 'empty_subject',
        subject,
        detail: null,
        description: `No valid scores found for ${subject}`,
      },
    ];
  }

  const anomalies: Anomaly[] = [];

  const perfectCount = scores.filter((s) => s === PERFECT_SCORE).length;
  if (perfectCount > scores.length * PERFECT_SCORE_SHARE) {
    anomalies.push({
      kind: 'excessive_perfect_scores',
      subject,
      detail: perfectCount,
      description: `Unusually high number of perfect scores in ${subject} (${perfectCount} students)`,
    });
  }

  const zeroCount = scores.filter((s) => s === 0).length;
  if (zeroCount > 0) {
    anomalies.push({
      kind: 'zero_scores',
      subject,
      detail: zeroCount,
      description: `${zeroCount} students have zero scores in ${subject}`,
    });
  }

  const passRate = (scores.filter((s) => s >= threshold).length / scores.length) * 100;
  if (passRate < LOW_PASS_RATE) {
    anomalies.push({
      kind: 'low_pass_rate',
      subject,
      detail: passRate,
      description: `Very low pass rate in ${subject} (${passRate.toFixed(1)}%)`,
    });
  }

  return anomalies;
}

function rankStudents(
  table: ScoreTable,
  thresholdFor: (subject: string) => number
): RankedStudent[] {
  const entries: Omit<RankedStudent, 'rank'>[] = [];

  table.students.forEach((student) => {
    const scores = attemptedScores(student, table.subjects);
    if (scores.length === 0) return;
    entries.push({
      id: student.id,
      name: student.name,
      average: mean(scores),
      subjectCount: scores.length,
      passedAll: passedAllSubjects(student, table.subjects, thresholdFor),
    });
  });

  // Array.prototype.sort is stable, so equal averages keep table order
  entries.sort((a, b) => b.average - a.average);

  return entries.map((entry, idx) => ({ rank: idx + 1, ...entry }));
}

/**
 * Analyze one validated score table under the given pass policy.
 * Pure: the policy is read once up front and the table is never mutated.
 */
export function analyzeResults(table: ScoreTable, policy: PassPolicy): AnalysisReport {
  const thresholds = new Map<string, number>();
  table.subjects.forEach((subject) => thresholds.set(subject, policy.resolve(subject)));
  const thresholdFor = (subject: string) => thresholds.get(subject) ?? policy.resolve(subject);

  const subjectStats = new Map<string, SubjectStatistics>();
  const anomalies: Anomaly[] = [];
  const allScores: number[] = [];

  table.subjects.forEach((subject) => {
    const attempts = collectAttempts(table, subject);
    const threshold = thresholdFor(subject);
    const scores = attempts.map((a) => a.score);

    anomalies.push(...detectSubjectAnomalies(subject, scores, threshold));
    if (attempts.length === 0) return;

    subjectStats.set(subject, computeSubjectStats(subject, attempts, threshold));
    allScores.push(...scores);
  });

  const totalStudents = table.students.length;
  const studentsPassedAll = table.students.filter((student) =>
    passedAllSubjects(student, table.subjects, thresholdFor)
  ).length;
  const rankedStudents = rankStudents(table, thresholdFor);

  return {
    totalStudents,
    totalSubjects: table.subjects.length,
    subjectStats,
    departmentPassRate: totalStudents > 0 ? (studentsPassedAll / totalStudents) * 100 : 0,
    overallTopStudent: rankedStudents[0] ?? null,
    rankedStudents,
    studentsPassedAll,
    // Students without any score are counted here as well
    studentsFailedAny: totalStudents - studentsPassedAll,
    averageScore: mean(allScores),
    anomalies,
    passCriteria: policy.snapshot(),
  };
}

export class AnalysisEngine {
  constructor(private readonly policy: PassPolicy) {}

  analyze(table: ScoreTable): AnalysisReport {
    return analyzeResults(table, this.policy);
  }
}
