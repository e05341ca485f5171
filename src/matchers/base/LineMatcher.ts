import { TestOutcome } from '../../types/report';

/**
 * Interface for recognizing one shape of build output line
 */
export interface LineMatcher<T> {
  /** The name used in logs */
  name: string;

  /**
   * Extract a value from a single line of output
   * Returns null if the line doesn't have this matcher's shape
   */
  match(line: string): T | null;
}

/**
 * Interface for matchers that turn a line into test outcomes
 */
export interface TestResultMatcher {
  /** The name used in logs */
  name: string;

  /**
   * Extract test outcomes from a single line of output.
   *
   * Returns null when the line is not this matcher's concern, so the next
   * matcher gets a turn. An empty array is a decision: the line was
   * recognized and deliberately contributes nothing.
   *
   * @param suite - The most recently announced suite, if any
   */
  match(line: string, suite: string | null): TestOutcome[] | null;
}
