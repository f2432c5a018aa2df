import { Command } from 'commander';
import { createBootstrapCommand } from './commands/bootstrap.ts';
import { createInitCommand } from './commands/init.ts';
import { createReleaseCommand } from './commands/release.ts';
import { createRunCommand } from './commands/run.ts';
import { createStepsCommand } from './commands/steps.ts';
import { getVersion } from './utils/get-version.ts';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('buildflow')
    .description('Scaffold CMake projects, run their build steps and release them')
    .version(getVersion())
    .option('-n, --dry-run', 'Print what would be done without touching disk, git or the hosting service', false)
    .option('-s, --silent', 'Suppress progress output', false)
    .option('-v, --verbose', 'Print debug messages', false)
    .option('--no-color', 'Disable ANSI colors');

  program.addCommand(createInitCommand());
  program.addCommand(createReleaseCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createStepsCommand());
  program.addCommand(createBootstrapCommand());

  return program;
}
