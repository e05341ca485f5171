import { LineMatcher } from '../base/LineMatcher';

/**
 * Extract the suite name from "Test Suite 'MyAppTests' started at 2024-01-15 10:30:00.000"
 */
export class SuiteContextMatcher implements LineMatcher<string> {
  name = 'suite-context';

  match(line: string): string | null {
    if (!line.includes("Test Suite '") || !line.includes("' started at")) {
      return null;
    }
    const parts = line.split("'");
    return parts.length >= 2 ? parts[1] : null;
  }
}
