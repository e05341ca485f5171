import { BuildSummary } from './types/report';
import { LineClassifier } from './LineClassifier';
import { Clock, RunState } from './RunState';
import { buildSummary } from './SummaryBuilder';
import { Logger } from './utils/logger';

export interface ParserOptions {
  /** Include the warnings list in the report */
  printWarnings?: boolean;
  /** Time source in milliseconds, Date.now unless given */
  clock?: Clock;
  classifier?: LineClassifier;
}

/**
 * Turns xcodebuild output into a BuildSummary.
 *
 * Reads line by line, collecting build errors, warnings and test results
 * from both XCTest and Swift Testing (parameterized tests included).
 * Every call starts from a fresh RunState, so one parser can be reused.
 *
 * ```ts
 * const parser = new XcodeBuildParser({ printWarnings: true });
 * const report = parser.parse(output.split('\n'));
 * ```
 */
export class XcodeBuildParser {
  private printWarnings: boolean;
  private clock: Clock;
  private classifier: LineClassifier;
  private logger: Logger;

  constructor(options: ParserOptions = {}) {
    this.printWarnings = options.printWarnings ?? false;
    this.clock = options.clock ?? Date.now;
    this.classifier = options.classifier ?? new LineClassifier();
    this.logger = Logger.create('parser');
  }

  parse(lines: Iterable<string>): BuildSummary {
    const state = this.startPass();
    for (const line of lines) {
      this.consume(state, line);
    }
    return this.finishPass(state);
  }

  /**
   * Same as parse, pulling lines from a stream such as readline over stdin
   */
  async parseStream(lines: AsyncIterable<string>): Promise<BuildSummary> {
    const state = this.startPass();
    for await (const line of lines) {
      this.consume(state, line);
    }
    return this.finishPass(state);
  }

  private startPass(): RunState {
    this.logger.lifecycle('Parse pass started', { printWarnings: this.printWarnings });
    return new RunState(this.clock);
  }

  private consume(state: RunState, line: string): void {
    const classification = this.classifier.classify(line, state.currentSuite);
    if (classification.diagnostic || classification.testResults.length > 0) {
      this.logger.debug('Line classified', {
        diagnostic: classification.diagnostic?.type,
        testResults: classification.testResults.length
      });
    }
    state.apply(classification);
  }

  private finishPass(state: RunState): BuildSummary {
    state.finish();
    const report = buildSummary(state, { printWarnings: this.printWarnings });
    this.logger.lifecycle('Parse pass complete', { ...report.summary, status: report.status });
    return report;
  }
}
