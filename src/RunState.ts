import { Diagnostic, TestOutcome } from './types/report';
import { LineClassification } from './LineClassifier';

/** Milliseconds since some fixed point; Date.now by default */
export type Clock = () => number;

/**
 * Accumulator for one parse pass. Each pass builds its own instance,
 * so nothing carries over between passes.
 */
export class RunState {
  readonly errors: Diagnostic[] = [];
  readonly warnings: Diagnostic[] = [];
  /** Every outcome, passed ones included */
  readonly testResults: TestOutcome[] = [];
  currentSuite: string | null = null;
  xcresultPath: string | null = null;
  startTime: number | null = null;
  endTime: number | null = null;

  constructor(private clock: Clock) {}

  /**
   * Fold one classified line into the running totals
   */
  apply(classification: LineClassification): void {
    if (this.startTime === null) {
      this.startTime = this.clock();
    }

    const { diagnostic } = classification;
    if (diagnostic) {
      if (diagnostic.type === 'error') {
        this.errors.push(diagnostic);
      } else {
        this.warnings.push(diagnostic);
      }
    }

    if (classification.suite !== null) {
      this.currentSuite = classification.suite;
    }

    this.testResults.push(...classification.testResults);

    if (classification.xcresultPath !== null) {
      this.xcresultPath = classification.xcresultPath;
    }

    // Re-captured on every marker; the last one counts
    if (classification.isCompletion) {
      this.endTime = this.clock();
    }
  }

  /**
   * Input is exhausted. Without any completion marker the run ends now.
   */
  finish(): void {
    if (this.endTime === null) {
      this.endTime = this.clock();
    }
  }
}
