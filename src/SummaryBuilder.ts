import { BuildSummary } from './types/report';
import { RunState } from './RunState';

export interface SummaryOptions {
  /** Include the warnings list; the count is always reported */
  printWarnings: boolean;
}

export function formatBuildTime(startTime: number | null, endTime: number | null): string {
  if (startTime === null || endTime === null) {
    return '0.000';
  }
  return ((endTime - startTime) / 1000).toFixed(3);
}

/**
 * Derive the final report from a finished run
 */
export function buildSummary(state: RunState, options: SummaryOptions): BuildSummary {
  const passedTests = state.testResults.filter(result => result.status === 'passed').length;
  const failed = state.testResults.filter(result => result.status === 'failed');

  return {
    status: state.errors.length === 0 && failed.length === 0 ? 'success' : 'failure',
    summary: {
      errors: state.errors.length,
      warnings: state.warnings.length,
      passedTests,
      failedTests: failed.length,
      buildTime: formatBuildTime(state.startTime, state.endTime)
    },
    errors: [...state.errors],
    ...(options.printWarnings ? { warnings: [...state.warnings] } : {}),
    testResults: failed,
    ...(state.xcresultPath !== null ? { xcresultPath: state.xcresultPath } : {})
  };
}
