import { TestOutcome } from '../../types/report';
import { TestResultMatcher } from '../base/LineMatcher';
import { parseOptionalInt } from '../base/captures';
import { resolveSuite } from './common';

// ✘ Test "testValidation" recorded an issue at ValidationTests.swift:41:9: Expectation failed
const ISSUE_LINE = /✘ Test "([^"]+)" recorded an issue.*at ([^:]+):(\d+):\d+: (.+)$/;

/**
 * Each recorded issue is one failing invocation, whether or not the test
 * is parameterized, so this always yields a single outcome.
 */
export class SwiftTestingIssueMatcher implements TestResultMatcher {
  name = 'swift-testing-issue';

  match(line: string, suite: string | null): TestOutcome[] | null {
    if (!line.includes('✘ Test') || !line.includes('recorded an issue')) {
      return null;
    }

    const match = line.match(ISSUE_LINE);
    if (!match) {
      return null;
    }

    return [{
      suite: resolveSuite(suite),
      testCase: match[1],
      status: 'failed',
      failureMessage: match[4],
      file: match[2],
      line: parseOptionalInt(match[3])
    }];
  }
}
