export interface StudentRecord {
  id: string;
  name: string | null;
  attributes: Record<string, string>;
  scores: ReadonlyMap<string, number | null>; // subject -> score, null = not attempted
}

export interface ScoreTable {
  subjects: readonly string[];
  students: readonly StudentRecord[];
}

export interface ColumnLayout {
  idColumn: string;
  nameColumn: string;
  descriptiveColumns: readonly string[];
}

export interface RawSheet {
  headers: string[];
  rows: unknown[][];
}

export interface Topper {
  readonly id: string;
  readonly name: string | null;
  readonly score: number;
}

export interface SubjectStatistics {
  readonly subject: string;
  readonly threshold: number;
  readonly attempted: number;
  readonly passed: number;
  readonly failed: number;
  readonly passRate: number;
  readonly failRate: number;
  readonly mean: number;
  readonly max: number;
  readonly min: number;
  readonly topper: Topper;
}

export interface RankedStudent {
  readonly rank: number;
  readonly id: string;
  readonly name: string | null;
  readonly average: number;
  readonly subjectCount: number;
  readonly passedAll: boolean;
}

export type AnomalyKind =
  | 'empty_subject'
  | 'excessive_perfect_scores'
  | 'zero_scores'
  | 'low_pass_rate';

export interface Anomaly {
  readonly kind: AnomalyKind;
  readonly subject: string;
  readonly detail: number | null; // count for score checks, rate for low_pass_rate
  readonly description: string;
}

export interface PassCriteria {
  readonly defaultThreshold: number;
  readonly overrides: Readonly<Record<string, number>>;
}

export interface AnalysisReport {
  readonly totalStudents: number;
  readonly totalSubjects: number;
  readonly subjectStats: ReadonlyMap<string, SubjectStatistics>;
  readonly departmentPassRate: number;
  readonly overallTopStudent: RankedStudent | null;
  readonly rankedStudents: readonly RankedStudent[];
  readonly studentsPassedAll: number;
  readonly studentsFailedAny: number;
  readonly averageScore: number;
  readonly anomalies: readonly Anomaly[];
  readonly passCriteria: PassCriteria;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export type ExportCell = string | number;

export interface ExportSheet {
  name: string;
  header: string[];
  rows: ExportCell[][];
}

export interface ExportData {
  summary: ExportSheet;
  subjectAnalysis: ExportSheet;
  studentPerformance: ExportSheet;
}

export interface ExportOptions {
  decimalPlaces: number;
  showStudentIds: boolean;
}

// Display of student identities, shared by every output of one run
export interface IdentityFormatter {
  id(id: string): string;
  name(id: string, name: string | null): string;
}

// Chart series
export interface ScoreBand {
  range: string;
  count: number;
}
