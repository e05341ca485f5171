import { Diagnostic } from '../../types/report';
import { LineMatcher } from '../base/LineMatcher';
import { parseOptionalInt } from '../base/captures';

// /path/to/File.swift:15:5: error: cannot find 'foo' in scope
const LOCATED_DIAGNOSTIC = /^(.+?):(\d+):(\d+):\s+(error|warning):\s+(.+)$/;

const BUILD_FAILED_BANNER = '** BUILD FAILED **';

// Tool errors that carry no file:line:column
const TOOL_ERROR_PATTERNS: RegExp[] = [
  /^clang: error:/i,
  /^ld: error:/i,
  /^swiftc: error:/i,
  /^error: linker command failed/i,
  /^error: fatalError/i,
  /^fatal error:/i,
  /^xcodebuild: error:/i,
  /^error: unable to/i,
  /^error: cannot/i
];

export class DiagnosticMatcher implements LineMatcher<Diagnostic> {
  name = 'diagnostic';

  match(line: string): Diagnostic | null {
    const located = line.match(LOCATED_DIAGNOSTIC);
    if (located) {
      return {
        file: located[1],
        line: parseOptionalInt(located[2]),
        column: parseOptionalInt(located[3]),
        message: located[5],
        type: located[4] === 'warning' ? 'warning' : 'error'
      };
    }

    const trimmed = line.trim();

    if (line.includes(BUILD_FAILED_BANNER)) {
      return { message: trimmed, type: 'error' };
    }

    if (TOOL_ERROR_PATTERNS.some(pattern => pattern.test(trimmed))) {
      return { message: trimmed, type: 'error' };
    }

    return null;
  }
}
