import { TestOutcome, TestStatus } from '../../types/report';

/**
 * Convert a numeric capture to an integer, or undefined if it doesn't fit
 */
export function parseOptionalInt(capture: string | undefined): number | undefined {
  if (capture === undefined || !/^\d+$/.test(capture)) {
    return undefined;
  }
  const value = Number(capture);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Convert a decimal capture such as "0.123" to a number.
 * Captures like "1.2.3" that only look numeric give undefined.
 */
export function parseOptionalFloat(capture: string | undefined): number | undefined {
  if (capture === undefined || !/^(\d+\.?\d*|\.\d+)$/.test(capture)) {
    return undefined;
  }
  const value = Number(capture);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Build one outcome per case of a (possibly parameterized) test.
 * More than one case gets names like "name [case 2]".
 */
export function expandCases(
  testName: string,
  caseCount: number,
  template: { suite: string; status: TestStatus; duration?: number }
): TestOutcome[] {
  const results: TestOutcome[] = [];
  for (let index = 0; index < caseCount; index++) {
    results.push({
      suite: template.suite,
      testCase: caseCount > 1 ? `${testName} [case ${index + 1}]` : testName,
      status: template.status,
      duration: template.duration
    });
  }
  return results;
}
