import { parseOptionalInt } from '../base/captures';

/** Suite reported for Swift Testing results seen before any suite announcement */
export const DEFAULT_SUITE = 'Swift Testing';

export function resolveSuite(suite: string | null): string {
  return suite ?? DEFAULT_SUITE;
}

/**
 * Pull the test name out of a summary match where group 1 is a quoted
 * display name and group 2 a bare `name()` function
 */
export function captureTestName(match: RegExpMatchArray): string {
  return match[1] ?? match[2] ?? '';
}

/**
 * "with 19 test cases" gives 19; a missing or unreadable count means one case
 */
export function captureCaseCount(capture: string | undefined): number {
  return parseOptionalInt(capture) ?? 1;
}
