import { Command } from 'commander';
import {
    DEFAULT_CONFIG_DIR,
    PROGRAM_NAME,
    VERSION,
} from '@/constants';
import * as Config from '@/config';
import { ConfigError } from '@/errors';
import { getLogger } from '@/logging';

export interface Args {
    root?: string;
    init?: boolean;
    organize?: string;
    archive?: string;
    monitor?: string | boolean;
    dryRun?: boolean;
    recursive?: boolean;
    hierarchical?: boolean;
    customer?: string;
    enforceNaming?: boolean;
    autoRename?: boolean;
    debounce?: string;
    configDirectory?: string;
    verbose?: boolean;
    debug?: boolean;
}

/**
 * What the invocation asked for. Several may be combined; they run in the
 * order init, organize, archive, monitor.
 */
export interface Actions {
    init: boolean;
    organize?: string;
    archive?: string;
    /** Directory to watch; defaults to the root directory */
    monitor?: string;
}

export const createProgram = (): Command => {
    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .summary('Organize CNC shop files by type, customer and part')
        .description('Sorts CAD, CAM, NC and inspection files into a standard folder layout, checks file names and watches drop folders')
        .option('--root <rootDirectory>', 'root of the organized folder tree')
        .option('--init', 'create the standard folder structure under the root')
        .option('--organize <directory>', 'organize every file found in a directory')
        .option('--archive <folder>', 'move a folder into ARCHIVE with a timestamp suffix')
        .option('--monitor [directory]', 'watch a directory and organize files once they stop changing')
        .option('--dry-run', 'report what would happen without touching any file')
        .option('--no-recursive', 'only organize files directly inside the directory')
        .option('--hierarchical', 'place files under <customer>/<part>-<rev>/<category>')
        .option('--customer <customer>', 'customer name; overrides any customer found in file names')
        .option('--enforce-naming', 'check file names against PART_REV-X_description.ext')
        .option('--auto-rename', 'rename files to the canonical name when it can be derived')
        .option('--debounce <ms>', 'quiet period before a watched file is processed')
        .option('--config-directory <configDirectory>', 'directory holding config.yaml', DEFAULT_CONFIG_DIR)
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .version(VERSION);
    return program;
};

const parseDebounce = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigError(`Invalid debounce: '${value}'. Must be a non-negative whole number of milliseconds.`);
    }
    return parsed;
};

/**
 * Only flags the user actually passed; anything else would mask the
 * config file.
 */
export const toCliValues = (cliArgs: Args, explicitRecursive: boolean): Partial<Config.Config> => ({
    ...(cliArgs.root !== undefined && { rootDirectory: cliArgs.root }),
    ...(cliArgs.configDirectory !== undefined && { configDirectory: cliArgs.configDirectory }),
    ...(cliArgs.dryRun !== undefined && { dryRun: cliArgs.dryRun }),
    ...(cliArgs.verbose !== undefined && { verbose: cliArgs.verbose }),
    ...(cliArgs.debug !== undefined && { debug: cliArgs.debug }),
    ...(explicitRecursive && cliArgs.recursive !== undefined && { recursive: cliArgs.recursive }),
    ...(cliArgs.hierarchical !== undefined && { hierarchical: cliArgs.hierarchical }),
    ...(cliArgs.enforceNaming !== undefined && { enforceNaming: cliArgs.enforceNaming }),
    ...(cliArgs.autoRename !== undefined && { autoRename: cliArgs.autoRename }),
    ...(cliArgs.customer !== undefined && { customer: cliArgs.customer }),
    ...(cliArgs.debounce !== undefined && { debounceMs: parseDebounce(cliArgs.debounce) }),
});

export const toActions = (cliArgs: Args): Actions => ({
    init: cliArgs.init === true,
    ...(cliArgs.organize !== undefined && { organize: cliArgs.organize }),
    ...(cliArgs.archive !== undefined && { archive: cliArgs.archive }),
    ...(cliArgs.monitor !== undefined && cliArgs.monitor !== false && {
        monitor: typeof cliArgs.monitor === 'string' ? cliArgs.monitor : '',
    }),
});

export const hasAction = (actions: Actions): boolean =>
    actions.init || actions.organize !== undefined || actions.archive !== undefined || actions.monitor !== undefined;

export const configure = async (
    argv: string[] = process.argv,
    env: NodeJS.ProcessEnv = process.env,
): Promise<[Config.Config, Actions]> => {
    const logger = getLogger();

    const program = createProgram();
    program.parse(argv);

    const cliArgs: Args = program.opts<Args>();
    logger.debug('Command Line Options: %s', JSON.stringify(cliArgs, null, 2));

    const configDirectory = cliArgs.configDirectory ?? DEFAULT_CONFIG_DIR;
    const fileValues = await Config.readConfigFile(configDirectory);
    const envValues = Config.readEnvironment(env);
    const cliValues = toCliValues(cliArgs, program.getOptionValueSource('recursive') === 'cli');

    // Defaults -> File -> Environment -> CLI (highest precedence)
    const config = Config.resolveConfig(fileValues, envValues, cliValues);
    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));

    return [config, toActions(cliArgs)];
};
