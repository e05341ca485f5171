import { Diagnostic, TestOutcome } from './types/report';
import { TestResultMatcher } from './matchers/base/LineMatcher';
import { DiagnosticMatcher } from './matchers/diagnostics/DiagnosticMatcher';
import { SuiteContextMatcher } from './matchers/suite/SuiteContextMatcher';
import { XCResultPathMatcher } from './matchers/xcresult/XCResultPathMatcher';
import { XCTestResultMatcher } from './matchers/xctest/XCTestResultMatcher';
import { SwiftTestingIssueMatcher } from './matchers/swift-testing/SwiftTestingIssueMatcher';
import { SwiftTestingSuccessMatcher } from './matchers/swift-testing/SwiftTestingSuccessMatcher';
import { SwiftTestingFailureMatcher } from './matchers/swift-testing/SwiftTestingFailureMatcher';
import { Logger } from './utils/logger';

/**
 * Test result matchers in priority order. The first one that returns
 * non-null decides the line, including an empty array.
 */
export const TEST_RESULT_MATCHERS: readonly TestResultMatcher[] = [
  new SwiftTestingIssueMatcher(),
  new SwiftTestingSuccessMatcher(),
  new SwiftTestingFailureMatcher(),
  new XCTestResultMatcher()
];

const COMPLETION_MARKERS = ['Test session results', 'BUILD SUCCEEDED', 'BUILD FAILED'] as const;

/**
 * Everything a single line contributed. A line can land in several
 * categories at once; only the test result matchers exclude each other.
 */
export interface LineClassification {
  diagnostic: Diagnostic | null;
  /** Suite announced on this line */
  suite: string | null;
  testResults: TestOutcome[];
  xcresultPath: string | null;
  isCompletion: boolean;
}

export class LineClassifier {
  private static logger = Logger.create('line-classifier');

  private diagnostics = new DiagnosticMatcher();
  private suites = new SuiteContextMatcher();
  private xcresultPaths = new XCResultPathMatcher();

  constructor(private testResultMatchers: readonly TestResultMatcher[] = TEST_RESULT_MATCHERS) {}

  /**
   * Classify one line
   *
   * @param currentSuite - Suite announced on an earlier line, if any
   */
  classify(line: string, currentSuite: string | null): LineClassification {
    const diagnostic = this.diagnostics.match(line);
    const suite = this.suites.match(line);

    // A suite announced on this very line applies to results on it
    const testResults = this.matchTestResults(line, suite ?? currentSuite);

    return {
      diagnostic,
      suite,
      testResults,
      xcresultPath: this.xcresultPaths.match(line),
      isCompletion: isCompletionMarker(line)
    };
  }

  private matchTestResults(line: string, suite: string | null): TestOutcome[] {
    for (const matcher of this.testResultMatchers) {
      const results = matcher.match(line, suite);
      if (results !== null) {
        if (results.length === 0) {
          LineClassifier.logger.decision('Test result line skipped', matcher.name, line);
        }
        return results;
      }
    }
    return [];
  }
}

export function isCompletionMarker(line: string): boolean {
  return COMPLETION_MARKERS.some(marker => line.includes(marker));
}
