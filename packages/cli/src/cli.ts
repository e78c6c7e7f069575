/**
 * @module @envstage/cli/cli
 */

import { Command, CommanderError, Option } from 'commander';
import { runDeployCommand } from './commands/deploy.js';
import { runEnvironmentsCommand } from './commands/environments.js';
import { EXIT_CODES } from './exit-codes.js';
import type { ExitCode } from './exit-codes.js';
import type { CliIO } from './io.js';
import { createProcessIO } from './io.js';

export const CLI_VERSION = '0.3.0';

function addSharedOptions(command: Command): Command {
  return command
    .requiredOption('-p, --project <pattern>', 'project name or part of it')
    .requiredOption('-s, --service-instance <name>', 'service instance folder under the deploy directory')
    .requiredOption('-w, --workspace <selector>', 'workspace folder under the workspace base, or an absolute path')
    .option('--json', 'print one JSON document instead of text')
    .option('-c, --config <file>', 'settings file (default ~/.envstage/config.json)')
    .option('--domain <suffix>', 'domain suffix for generated hostnames')
    .option('--drive <letter>', 'drive letter that config paths are moved to')
    .option('--workspace-base <dir>', 'directory that holds the workspaces')
    .option('-v, --verbose', 'log debug output');
}

export function createProgram(io: CliIO, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  // Set before adding commands so subcommands inherit them.
  program
    .name('envstage')
    .description('Stage per-environment configuration into a project build')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });

  addSharedOptions(
    program.command('deploy').description('transform and stage an environment config, then update project metadata')
  )
    .requiredOption('-e, --environment <name>', 'environment name, e.g. DEV1')
    .option('-n, --dry-run', 'resolve and preview without writing anything')
    .addOption(
      new Option('--startup-project <mode>', 'register the project as IDE startup project')
        .choices(['ask', 'yes', 'no'])
        .default('ask')
    )
    .action(async (options: unknown) => {
      onExit(await runDeployCommand(options, io));
    });

  addSharedOptions(
    program.command('environments').description('list the environments a service instance can be deployed to')
  ).action(async (options: unknown) => {
    onExit(await runEnvironmentsCommand(options, io));
  });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = createProcessIO()): Promise<number> {
  let exitCode: ExitCode = EXIT_CODES.ok;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.usage;
    }
    throw error;
  }
  return exitCode;
}
