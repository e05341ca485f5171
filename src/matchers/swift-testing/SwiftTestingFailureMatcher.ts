import { TestOutcome } from '../../types/report';
import { TestResultMatcher } from '../base/LineMatcher';
import { expandCases, parseOptionalFloat } from '../base/captures';
import { captureCaseCount, captureTestName, resolveSuite } from './common';

// ✘ Test "division" failed after 0.002 seconds with 1 issue.
// ✗ Test division() failed after 0.002 seconds.
// Function names may be any Unicode identifier
const FAILED_LINE = /[✗✘] Test (?:"([^"]+)"|([\p{L}\p{N}\p{M}_]+\(\))) (?:with (\d+) test cases )?failed after ([\d.]+) seconds/u;

/**
 * Failure summaries carry no location or message; those come from the
 * issue lines.
 */
export class SwiftTestingFailureMatcher implements TestResultMatcher {
  name = 'swift-testing-failure';

  match(line: string, suite: string | null): TestOutcome[] | null {
    if ((!line.includes('✗ Test') && !line.includes('✘ Test')) || !line.includes('failed after')) {
      return null;
    }

    // "... with 2 test cases failed after 0.456 seconds with 2 issues." rolls up
    // failures already reported one by one as recorded issues
    if (isParameterizedRollup(line)) {
      return [];
    }

    const match = line.match(FAILED_LINE);
    if (!match) {
      return null;
    }

    return expandCases(captureTestName(match), captureCaseCount(match[3]), {
      suite: resolveSuite(suite),
      status: 'failed',
      duration: parseOptionalFloat(match[4])
    });
  }
}

export function isParameterizedRollup(line: string): boolean {
  return line.includes('with') && line.includes('test cases') && line.includes('issues');
}
