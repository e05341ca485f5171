import { LineMatcher } from '../base/LineMatcher';

const BUNDLE_SUFFIX = '.xcresult';

/**
 * Picks up the result bundle path xcodebuild prints near the end of a test run,
 * e.g. "\t/Users/me/Library/Developer/Xcode/DerivedData/.../Run-App.xcresult"
 */
export class XCResultPathMatcher implements LineMatcher<string> {
  name = 'xcresult-path';

  match(line: string): string | null {
    const trimmed = line.trim();
    if (!trimmed.endsWith(BUNDLE_SUFFIX) || !trimmed.startsWith('/')) {
      return null;
    }
    return trimmed;
  }
}
