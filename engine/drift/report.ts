// engine/drift/report.ts — Per-dependency drift summary

import type { DriftIssue, DriftReport } from '../types.js';

export function generateDriftReport(dependencyName: string, issues: DriftIssue[]): DriftReport {
  const errors = issues.filter((i) => i.severity === 'error').length;
  const warnings = issues.filter((i) => i.severity === 'warning').length;

  if (issues.length === 0) {
    return {
      dependencyName,
      totalIssues: 0,
      errors: 0,
      warnings: 0,
      issues: [],
      success: true,
      message: `All API calls align with ${dependencyName} contract`,
    };
  }

  return {
    dependencyName,
    totalIssues: issues.length,
    errors,
    warnings,
    issues,
    success: false,
    message: `Found ${issues.length} drift issue(s) with ${dependencyName} contract`,
  };
}
