import { BuildSummary } from './types/report';
import { ReportSerializationError } from './errors';

/**
 * Pretty JSON for a report. Absent optional fields are left out rather
 * than written as null.
 */
export function serializeReport(report: BuildSummary): string {
  try {
    return JSON.stringify(report, null, 2);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReportSerializationError(reason, { cause: error });
  }
}
