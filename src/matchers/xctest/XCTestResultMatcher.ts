import { TestOutcome, TestStatus } from '../../types/report';
import { TestResultMatcher } from '../base/LineMatcher';
import { parseOptionalFloat } from '../base/captures';

// Test Case '-[MyAppTests testFailure]' failed (0.002 seconds).
// Tried in this order, so a line carrying both reports the pass.
const XCTEST_RESULTS: ReadonlyArray<[TestStatus, RegExp]> = [
  ['passed', /Test Case '-\[(.+?)\s+(.+?)\]' passed \((\d+\.\d+) seconds\)\./],
  ['failed', /Test Case '-\[(.+?)\s+(.+?)\]' failed \((\d+\.\d+) seconds\)\./]
];

/**
 * XCTest names its suite inside the result line, so the announced suite is ignored
 */
export class XCTestResultMatcher implements TestResultMatcher {
  name = 'xctest';

  match(line: string, _suite: string | null): TestOutcome[] | null {
    for (const [status, pattern] of XCTEST_RESULTS) {
      const match = line.match(pattern);
      if (match) {
        return [{
          suite: match[1],
          testCase: match[2],
          status,
          duration: parseOptionalFloat(match[3])
        }];
      }
    }
    return null;
  }
}
