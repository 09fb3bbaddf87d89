import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_WAIT_SECONDS } from '../config.js';
import { runCommand, statusCommand, type CommandResult } from './commands.js';

// When built, this file is dist/cli.js, so package.json is one level up
const packageJson = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
);

function emit(result: CommandResult): void {
  for (const line of result.stdout) {
    console.log(line);
  }
  for (const line of result.stderr) {
    console.error(line);
  }
}

const program = new Command();

program
  .name('periodic-worker')
  .description('Periodic worker framework: run a worker loop or inspect worker status')
  .version(packageJson.version);

program
  .command('run')
  .description('Run a worker loop in this process')
  .requiredOption('--worker-type <reference>', 'Worker class to run, as <module path>#<ExportName>')
  .option('--log-dir <dir>', 'Directory for log files (default: current directory)')
  .option('--stats-dir <dir>', 'Directory for stats files (default: same as log-dir)')
  .option('--wait-seconds <n>', `Seconds to wait between work cycles (default: ${DEFAULT_WAIT_SECONDS})`)
  .option('--max-cycles <n>', 'Maximum number of work cycles before stopping (default: unlimited)')
  .option('--worker-params <json>', 'JSON object of worker-specific parameters', '{}')
  .option('--worker-id <id>', 'Override worker ID (default: the worker type default)')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--managed', 'Marks a process launched by a WorkerManager')
  .action(async (options) => {
    try {
      const result = await runCommand(options);
      emit(result);
      process.exit(result.exitCode);
    } catch (error) {
      console.error('Unexpected error:', error instanceof Error ? error.message : error);
      if (options.verbose && error instanceof Error && error.stack) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program
  .command('status')
  .description('Show worker status information')
  .option('--stats-dir <dir>', 'Directory containing stats files', '.')
  .option('--worker-id <id>', 'Show status for a specific worker ID')
  .option('--format <format>', 'Output format (text|json)', 'text')
  .action(async (options) => {
    try {
      const result = await statusCommand(options);
      emit(result);
      process.exit(result.exitCode);
    } catch (error) {
      console.error('Error reading status:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parse();
