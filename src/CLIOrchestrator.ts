import { createInterface } from 'readline';
import { $ } from 'zx';
import { BuildSummary } from './types/report';
import { XcodeBuildParser } from './XcodeBuildParser';
import { serializeReport } from './serialize';
import { Clock } from './RunState';
import { Logger } from './utils/logger';

// Disable zx verbosity
$.verbose = false;

export interface CLIStreams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface CLIOptions {
  printWarnings?: boolean;
}

/**
 * Connects the parser to the outside world. Methods resolve to the exit
 * code instead of exiting, so the entry point decides when the process ends.
 */
export class CLIOrchestrator {
  private logger = Logger.create('cli');

  constructor(
    private streams: CLIStreams = process,
    private clock: Clock = Date.now
  ) {}

  /**
   * Parse output piped in on stdin, e.g. `xcodebuild test 2>&1 | xcbuild-parser`
   */
  async parseInput(options: CLIOptions = {}): Promise<number> {
    try {
      const parser = this.createParser(options);
      const lines = createInterface({ input: this.streams.stdin, crlfDelay: Infinity });
      const report = await parser.parseStream(lines);
      return this.writeReport(report) ? 0 : 1;
    } catch (error) {
      return this.fail('Failed to read build output', error);
    }
  }

  /**
   * Run a build command and parse its combined stdout/stderr.
   * Resolves to the command's own exit code once the report is written.
   */
  async runCommand(commandArgs: string[], options: CLIOptions = {}): Promise<number> {
    const command = commandArgs.join(' ');
    this.logger.command(command, commandArgs);

    try {
      const parser = this.createParser(options);
      const proc = $`sh -c ${`${command} 2>&1`}`.nothrow();
      const lines = createInterface({ input: proc.stdout, crlfDelay: Infinity });
      const report = await parser.parseStream(lines);
      const output = await proc;

      const exitCode = output.exitCode ?? 1;
      if (exitCode !== 0) {
        this.logger.warn('Build command exited with a failure code', { exitCode });
      }

      return this.writeReport(report) ? exitCode : 1;
    } catch (error) {
      return this.fail(`Failed to run \`${command}\``, error);
    }
  }

  private createParser(options: CLIOptions): XcodeBuildParser {
    return new XcodeBuildParser({
      printWarnings: options.printWarnings ?? false,
      clock: this.clock
    });
  }

  /**
   * Returns false when the report could not be serialized
   */
  private writeReport(report: BuildSummary): boolean {
    let json: string;
    try {
      json = serializeReport(report);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to encode build summary', error);
      this.streams.stderr.write(`Error: Failed to encode build summary - ${reason}\n`);
      return false;
    }
    this.streams.stdout.write(json + '\n');
    return true;
  }

  private fail(message: string, error: unknown): number {
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.error(message, error);
    this.streams.stderr.write(`Error: ${message} - ${reason}\n`);
    return 1;
  }
}
