/**
 * CLI Entry Point
 *
 * Routes between the `name` and `job` subcommands and the main organizer flow.
 */

import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from '../constants';
import { registerNameCommands } from './name';
import { registerJobCommands } from './job';

const SUBCOMMANDS = ['name', 'job'];

/**
 * Check if the CLI arguments start with a subcommand
 */
export const isSubcommand = (argv: string[] = process.argv): boolean => {
    const args = argv.slice(2);
    if (args.length === 0) return false;
    return SUBCOMMANDS.includes(args[0]);
};

export const createSubcommandProgram = (): Command => {
    const program = new Command();

    program
        .name(PROGRAM_NAME)
        .version(VERSION)
        .description('CNC file naming and programming workflow tools');

    registerNameCommands(program);
    registerJobCommands(program);

    program.addHelpText('after', `
To organize files:
  ${PROGRAM_NAME} --init --root <dir>
  ${PROGRAM_NAME} --organize <dir> [--hierarchical] [--dry-run]
  ${PROGRAM_NAME} --monitor [dir]

File names:
  ${PROGRAM_NAME} name check <filenames...>      Validate names, suggest fixes
  ${PROGRAM_NAME} name format <part> <rev> <desc> <ext>

Programming jobs:
  ${PROGRAM_NAME} job create <customer> <part> <rev> [-p 3]
  ${PROGRAM_NAME} job assign <jobId> <programmer>
  ${PROGRAM_NAME} job start|complete|approve|close <jobId>
  ${PROGRAM_NAME} job list [-s QUEUED]
  ${PROGRAM_NAME} job report
  ${PROGRAM_NAME} job workload [programmer]
`);

    return program;
};

/**
 * Run the subcommand CLI
 */
export const runSubcommandCLI = async (argv: string[] = process.argv): Promise<void> => {
    await createSubcommandProgram().parseAsync(argv);
};
