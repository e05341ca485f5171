import { TestOutcome } from '../../types/report';
import { TestResultMatcher } from '../base/LineMatcher';
import { expandCases, parseOptionalFloat } from '../base/captures';
import { captureCaseCount, captureTestName, resolveSuite } from './common';

// ✔ Test "addition" passed after 0.001 seconds.
// ✔ Test "addition" with 19 test cases passed after 0.123 seconds.
// ✔ Test addition() passed after 0.001 seconds.
// ✔ Test prüfen() passed after 0.001 seconds.
const PASSED_LINE = /✔ Test (?:"([^"]+)"|([\p{L}\p{N}\p{M}_]+\(\))) (?:with (\d+) test cases )?passed after ([\d.]+) seconds\./u;

export class SwiftTestingSuccessMatcher implements TestResultMatcher {
  name = 'swift-testing-success';

  match(line: string, suite: string | null): TestOutcome[] | null {
    if (!line.includes('✔ Test') || !line.includes('passed after')) {
      return null;
    }

    const match = line.match(PASSED_LINE);
    if (!match) {
      return null;
    }

    return expandCases(captureTestName(match), captureCaseCount(match[3]), {
      suite: resolveSuite(suite),
      status: 'passed',
      duration: parseOptionalFloat(match[4])
    });
  }
}
