import { Command } from 'commander';
import { CLIOrchestrator } from './CLIOrchestrator';

export const VERSION = '0.1.0';

export function createProgram(orchestrator: CLIOrchestrator = new CLIOrchestrator()): Command {
  const program = new Command();

  program
    .name('xcbuild-parser')
    .description('Turn xcodebuild output into a JSON build and test summary')
    .version(VERSION)
    .enablePositionalOptions()
    .option('--print-warnings', 'include the list of warnings in the report')
    .action(async (options: { printWarnings?: boolean }) => {
      process.exitCode = await orchestrator.parseInput({ printWarnings: options.printWarnings });
    });

  program
    .command('run <command...>')
    .description('Run a build command and parse its output')
    .option('--print-warnings', 'include the list of warnings in the report')
    .passThroughOptions()
    .action(async (commandArgs: string[], options: { printWarnings?: boolean }) => {
      // The flag may also come before `run`, where the root command takes it
      const printWarnings = options.printWarnings ?? program.opts<{ printWarnings?: boolean }>().printWarnings;
      process.exitCode = await orchestrator.runCommand(commandArgs, { printWarnings });
    });

  return program;
}
