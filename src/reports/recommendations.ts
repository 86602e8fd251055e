import type { AnalysisReport } from '../lib/types';

/**
 * Deterministic follow-up suggestions derived from an analysis report
 */
export function generateRecommendations(report: AnalysisReport): string[] {
  const recommendations: string[] = [];

  const deptPassRate = report.departmentPassRate;
  if (deptPassRate < 50) {
    recommendations.push(
      '**Critical:** Department pass rate is below 50%. Consider reviewing curriculum and teaching methods.'
    );
  } else if (deptPassRate < 70) {
    recommendations.push('Department pass rate needs improvement. Focus on identifying struggling students early.');
  }

  report.subjectStats.forEach((stats, subject) => {
    if (stats.passRate < 40) {
      recommendations.push(
        `**${subject}:** Very low pass rate (${stats.passRate.toFixed(1)}%). Consider additional support or curriculum review.`
      );
    } else if (stats.passRate < 60) {
      recommendations.push(`**${subject}:** Below-average performance. Consider targeted interventions.`);
    }
  });

  if (report.studentsFailedAny > report.totalStudents * 0.3) {
    recommendations.push(
      'High number of students failing subjects. Consider implementing peer tutoring or additional support systems.'
    );
  }

  report.anomalies.forEach((anomaly) => {
    if (anomaly.kind === 'zero_scores') {
      recommendations.push(
        `Investigate zero scores in ${anomaly.subject}. May indicate attendance or assessment issues.`
      );
    } else if (anomaly.kind === 'excessive_perfect_scores') {
      recommendations.push(
        `Review assessment difficulty in ${anomaly.subject} due to high number of perfect scores.`
      );
    }
  });

  if (recommendations.length === 0) {
    recommendations.push('Overall performance is satisfactory. Continue monitoring and supporting student progress.');
  }

  recommendations.push('Regular monitoring and early intervention for at-risk students is recommended.');
  recommendations.push('Consider subject-wise faculty meetings to discuss improvement strategies.');

  return recommendations;
}
