import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Readable, Writable } from 'stream';
import { CLIOrchestrator, CLIStreams } from '../../src/CLIOrchestrator';
import { ReportSerializationError } from '../../src/errors';

const { shell, serialize } = vi.hoisted(() => ({
  shell: vi.fn(),
  serialize: vi.fn()
}));

// Mock zx module
vi.mock('zx', () => ({
  $: Object.assign(shell, { verbose: true })
}));

vi.mock('../../src/serialize', async importOriginal => {
  const actual = await importOriginal<typeof import('../../src/serialize')>();
  serialize.mockImplementation(actual.serializeReport);
  return { serializeReport: serialize };
});

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    }
  });
  return { stream, text: () => chunks.join('') };
}

function fakeProcess(output: string, exitCode: number | null) {
  const done = Promise.resolve({ exitCode });
  return {
    stdout: Readable.from([output]),
    then: done.then.bind(done)
  };
}

const FAILING_BUILD = [
  '/Users/dev/App/Sources/main.swift:15:5: warning: unused value',
  "Test Suite 'AppTests' started at 2024-03-02 09:00:00.000.",
  "Test Case '-[AppTests testLaunch]' passed (0.010 seconds).",
  '✘ Test "totals" recorded an issue at AppTests.swift:41:9: Expectation failed',
  '** BUILD FAILED **',
  ''
].join('\n');

describe('CLIOrchestrator', () => {
  let stdout: ReturnType<typeof capture>;
  let stderr: ReturnType<typeof capture>;

  function orchestrator(input: string): CLIOrchestrator {
    const streams: CLIStreams = {
      stdin: Readable.from([input]),
      stdout: stdout.stream,
      stderr: stderr.stream
    };
    return new CLIOrchestrator(streams, () => 0);
  }

  beforeEach(() => {
    stdout = capture();
    stderr = capture();
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should silence zx', async () => {
    const zx = await import('zx');
    expect(zx.$.verbose).toBe(false);
  });

  describe('parseInput', () => {
    it('should print the report for piped output and exit 0', async () => {
      const exitCode = await orchestrator(FAILING_BUILD).parseInput();

      expect(exitCode).toBe(0);
      expect(stderr.text()).toBe('');
      expect(JSON.parse(stdout.text())).toEqual({
        status: 'failure',
        summary: { errors: 1, warnings: 1, passedTests: 1, failedTests: 1, buildTime: '0.000' },
        errors: [{ message: '** BUILD FAILED **', type: 'error' }],
        testResults: [
          {
            suite: 'AppTests',
            testCase: 'totals',
            status: 'failed',
            failureMessage: 'Expectation failed',
            file: 'AppTests.swift',
            line: 41
          }
        ]
      });
    });

    it('should include warnings when asked', async () => {
      await orchestrator(FAILING_BUILD).parseInput({ printWarnings: true });

      expect(JSON.parse(stdout.text()).warnings).toEqual([
        {
          file: '/Users/dev/App/Sources/main.swift',
          line: 15,
          column: 5,
          message: 'unused value',
          type: 'warning'
        }
      ]);
    });

    it('should handle CRLF line endings', async () => {
      await orchestrator('** BUILD SUCCEEDED **\r\n\t/tmp/Run.xcresult\r\n').parseInput();

      expect(JSON.parse(stdout.text()).xcresultPath).toBe('/tmp/Run.xcresult');
    });

    it('should exit 1 with a message when the report cannot be encoded', async () => {
      serialize.mockImplementationOnce(() => {
        throw new ReportSerializationError('Converting circular structure to JSON');
      });

      const exitCode = await orchestrator(FAILING_BUILD).parseInput();

      expect(exitCode).toBe(1);
      expect(stdout.text()).toBe('');
      expect(stderr.text()).toBe('Error: Failed to encode build summary - Converting circular structure to JSON\n');
    });
  });

  describe('runCommand', () => {
    it('should run the command through sh with stderr folded into stdout', async () => {
      shell.mockReturnValue({ nothrow: () => fakeProcess('** BUILD SUCCEEDED **\n', 0) });

      await orchestrator('').runCommand(['xcodebuild', 'test', '-scheme', 'App']);

      expect(shell).toHaveBeenCalledTimes(1);
      expect(shell.mock.calls[0][0]).toEqual(['sh -c ', '']);
      expect(shell.mock.calls[0][1]).toBe('xcodebuild test -scheme App 2>&1');
    });

    it('should parse the command output and pass its exit code through', async () => {
      shell.mockReturnValue({ nothrow: () => fakeProcess(FAILING_BUILD, 65) });

      const exitCode = await orchestrator('').runCommand(['xcodebuild', 'test']);

      expect(exitCode).toBe(65);
      const report = JSON.parse(stdout.text());
      expect(report.status).toBe('failure');
      expect(report.summary.failedTests).toBe(1);
    });

    it('should exit 1 when the command has no exit code', async () => {
      shell.mockReturnValue({ nothrow: () => fakeProcess('** BUILD SUCCEEDED **\n', null) });

      expect(await orchestrator('').runCommand(['xcodebuild', 'build'])).toBe(1);
      expect(JSON.parse(stdout.text()).status).toBe('success');
    });

    it('should report a command that cannot be started', async () => {
      shell.mockImplementation(() => {
        throw new Error('spawn sh ENOENT');
      });

      const exitCode = await orchestrator('').runCommand(['xcodebuild', 'build']);

      expect(exitCode).toBe(1);
      expect(stdout.text()).toBe('');
      expect(stderr.text()).toBe('Error: Failed to run `xcodebuild build` - spawn sh ENOENT\n');
    });
  });
});
