export type DiagnosticKind = 'error' | 'warning';

export type TestStatus = 'passed' | 'failed';

/**
 * A compiler or tool message, with source location when the line carried one
 */
export interface Diagnostic {
  file?: string;
  line?: number;
  column?: number;
  message: string;
  type: DiagnosticKind;
}

/**
 * Result of one concrete test invocation
 */
export interface TestOutcome {
  suite: string;
  testCase: string;
  status: TestStatus;
  /** Seconds */
  duration?: number;
  failureMessage?: string;
  file?: string;
  line?: number;
}

export interface Summary {
  errors: number;
  warnings: number;
  passedTests: number;
  failedTests: number;
  /** Elapsed seconds, three decimals */
  buildTime: string;
}

export interface BuildSummary {
  status: 'success' | 'failure';
  summary: Summary;
  errors: Diagnostic[];
  /** Only present when warnings were requested */
  warnings?: Diagnostic[];
  /** Failed outcomes only */
  testResults: TestOutcome[];
  xcresultPath?: string;
}
