export { XcodeBuildParser } from './XcodeBuildParser';
export type { ParserOptions } from './XcodeBuildParser';
export { LineClassifier, TEST_RESULT_MATCHERS, isCompletionMarker } from './LineClassifier';
export type { LineClassification } from './LineClassifier';
export { RunState } from './RunState';
export type { Clock } from './RunState';
export { buildSummary, formatBuildTime } from './SummaryBuilder';
export { serializeReport } from './serialize';
export { ReportSerializationError } from './errors';
export { DiagnosticMatcher } from './matchers/diagnostics/DiagnosticMatcher';
export { XCResultPathMatcher } from './matchers/xcresult/XCResultPathMatcher';
export { SuiteContextMatcher } from './matchers/suite/SuiteContextMatcher';
export { XCTestResultMatcher } from './matchers/xctest/XCTestResultMatcher';
export { SwiftTestingIssueMatcher } from './matchers/swift-testing/SwiftTestingIssueMatcher';
export { SwiftTestingSuccessMatcher } from './matchers/swift-testing/SwiftTestingSuccessMatcher';
export { SwiftTestingFailureMatcher } from './matchers/swift-testing/SwiftTestingFailureMatcher';
export type { LineMatcher, TestResultMatcher } from './matchers/base/LineMatcher';
export type { BuildSummary, Diagnostic, DiagnosticKind, Summary, TestOutcome, TestStatus } from './types/report';
