import { Command } from 'commander';
import {
  cleanCommand,
  graphCommand,
  lsCommand,
  passthroughCommand,
  runAllCommand,
  runCommand,
  statusCommand,
  validateCommand,
} from './commands/index.js';
import { runWithContext, type GlobalOptions } from './context.js';
import { STACK_OPERATIONS } from '../types/index.js';

/**
 * Build the command tree. Each call returns a fresh program, so option
 * values never carry over between parses.
 */
export const createProgram = (): Command => {
  const program = new Command();

  program
    .name('stackrun')
    .description('Run a provisioner across a tree of dependent stacks in dependency order')
    .version('1.0.0')
    .enablePositionalOptions()
    .passThroughOptions()
    .option('-e, --env <name>', 'Environment used to select var and env files')
    .option('-r, --root <dir>', 'Root directory to search for stacks')
    .option('--max-depth <n>', 'Maximum discovery depth (0 for unbounded)')
    .option('--provisioner-bin <path>', 'Provisioner binary to run')
    .option('--timeout <seconds>', 'Per-stack timeout in seconds (0 for none)')
    .option('--continue-on-error', 'Keep running stacks whose dependencies succeeded')
    .option('--dry-run', 'Print the commands without running them')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Hide provisioner output and show a spinner instead');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  STACK_OPERATIONS.forEach((operation) => {
    program
      .command(operation)
      .description(`Run '${operation}' on a single stack`)
      .requiredOption('-s, --stack <name>', 'Stack name')
      .argument('[providerArgs...]', 'Arguments forwarded to the provisioner (after --)')
      .action(async (providerArgs: string[], options: { stack: string }) => {
        await runWithContext({
          options: globals(),
          handler: (context) =>
            runCommand({ context, operation, stackName: options.stack, providerArgs }),
        });
      });

    program
      .command(`${operation}-all`)
      .description(`Run '${operation}' on every stack in dependency order`)
      .option('-y, --confirm', 'Skip the confirmation prompt')
      .argument('[providerArgs...]', 'Arguments forwarded to the provisioner (after --)')
      .action(async (providerArgs: string[], options: { confirm?: boolean }) => {
        await runWithContext({
          options: globals(),
          handler: (context) =>
            runAllCommand({ context, operation, confirm: options.confirm, providerArgs }),
        });
      });
  });

  program
    .command('ls')
    .alias('list-stacks')
    .description('List discovered stacks')
    .action(async () => {
      await runWithContext({ options: globals(), handler: (context) => lsCommand({ context }) });
    });

  program
    .command('graph')
    .description('Show the execution order with dependencies')
    .option('--destroy', 'Show the destroy order instead')
    .action(async (options: { destroy?: boolean }) => {
      await runWithContext({
        options: globals(),
        handler: (context) => graphCommand({ context, destroy: options.destroy }),
      });
    });

  program
    .command('validate')
    .description('Check stack declarations and the dependency graph')
    .action(async () => {
      await runWithContext({
        options: globals(),
        handler: (context) => validateCommand({ context }),
      });
    });

  program
    .command('status [stack]')
    .description('Show the last recorded outcome of each stack')
    .action(async (stackName?: string) => {
      await runWithContext({
        options: globals(),
        handler: (context) => statusCommand({ context, stackName }),
      });
    });

  program
    .command('clean')
    .description('Remove provisioner working files from stacks')
    .option('-s, --stack <name>', 'Only clean this stack')
    .option('--include-state', 'Also remove local state files')
    .action(async (options: { stack?: string; includeState?: boolean }) => {
      await runWithContext({
        options: globals(),
        handler: (context) =>
          cleanCommand({
            context,
            stackName: options.stack,
            includeState: options.includeState,
          }),
      });
    });

  program
    .argument('[command...]', 'Any other command is passed to the provisioner')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      if (args.length === 0) {
        program.help();
      }
      await runWithContext({
        options: globals(),
        handler: (context) => passthroughCommand({ context, args }),
      });
    });

  return program;
};

export const run = async (argv: readonly string[] = process.argv): Promise<void> => {
  await createProgram().parseAsync([...argv]);
};
