/**
 * Configuration
 *
 * Settings are layered: built-in defaults, then `<configDirectory>/config.yaml`,
 * then environment, then command line flags. The merged object is validated
 * once and handed to every component's create().
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import {
    CATEGORIES,
    DEFAULT_CONFIG_FILE_NAME,
    SHOPFLOOR_DEFAULTS,
} from '../constants';
import { ConfigError, errorCode } from '../errors';
import * as Logging from '../logging';

const FoldersSchema = z.object({
    CAD: z.string().min(1),
    CAM: z.string().min(1),
    NC_FILES: z.string().min(1),
    NC_PROVEN: z.string().min(1),
    NC_UNPROVEN: z.string().min(1),
    MPI: z.string().min(1),
    ARCHIVE: z.string().min(1),
    HOLDING: z.string().min(1),
});

const CategoriesSchema = z.record(z.enum(CATEGORIES), z.array(z.string()));

const PatternSchema = z.object({
    name: z.string().min(1),
    field: z.enum(['customer', 'revision', 'partNumber']),
    source: z.string().min(1),
});

export const FileConfigSchema = z.object({
    rootDirectory: z.string().optional(),
    workflowDirectory: z.string().optional(),
    dryRun: z.boolean().optional(),
    recursive: z.boolean().optional(),
    hierarchical: z.boolean().optional(),
    enforceNaming: z.boolean().optional(),
    autoRename: z.boolean().optional(),
    debounceMs: z.number().int().nonnegative().optional(),
    folders: FoldersSchema.partial().optional(),
    categories: CategoriesSchema.optional(),
    ignorePatterns: z.array(z.string()).optional(),
    patterns: z.array(PatternSchema).optional(),
}).strict();

export const ConfigSchema = z.object({
    rootDirectory: z.string().min(1),
    configDirectory: z.string().min(1),
    workflowDirectory: z.string().min(1),
    dryRun: z.boolean(),
    verbose: z.boolean(),
    debug: z.boolean(),
    recursive: z.boolean(),
    hierarchical: z.boolean(),
    enforceNaming: z.boolean(),
    autoRename: z.boolean(),
    debounceMs: z.number().int().nonnegative(),
    folders: FoldersSchema,
    categories: CategoriesSchema,
    ignorePatterns: z.array(z.string()),
    patterns: z.array(PatternSchema).optional(),
    customer: z.string().min(1).optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

const formatIssues = (error: z.ZodError): string =>
    error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');

export const configFilePath = (configDirectory: string): string =>
    path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

/**
 * Read the YAML config file. A missing file is an empty config.
 */
export const readConfigFile = async (configDirectory: string): Promise<FileConfig> => {
    const logger = Logging.getLogger();
    const file = configFilePath(configDirectory);

    let content: string;
    try {
        content = await fs.readFile(file, 'utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') {
            logger.debug('No config file at %s, using defaults', file);
            return {};
        }
        throw new ConfigError(`Cannot read config file: ${error instanceof Error ? error.message : String(error)}`, file);
    }

    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (error) {
        throw new ConfigError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, file);
    }

    if (raw === undefined || raw === null) {
        return {};
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, file);
    }

    logger.debug('Loaded config file %s', file);
    return parsed.data;
};

/**
 * Values taken from the environment. `env` defaults to process.env.
 */
export const readEnvironment = (env: NodeJS.ProcessEnv = process.env): Partial<Config> => ({
    ...(env.SHOPFLOOR_ROOT !== undefined && env.SHOPFLOOR_ROOT !== '' && { rootDirectory: env.SHOPFLOOR_ROOT }),
});

/**
 * Merge layers in increasing precedence and validate the result.
 */
export const resolveConfig = (
    fileValues: FileConfig,
    envValues: Partial<Config>,
    cliValues: Partial<Config>
): Config => {
    const merged = {
        ...SHOPFLOOR_DEFAULTS,
        ...fileValues,
        ...envValues,
        ...cliValues,
        folders: {
            ...SHOPFLOOR_DEFAULTS.folders,
            ...fileValues.folders,
            ...cliValues.folders,
        },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
};

export const defaults = (): Config => resolveConfig({}, {}, {});
