/**
 * Shopfloor Public API
 *
 * Programmatic access to the engine behind the `shopfloor` command: field
 * extraction, categorization, naming, guarded moves, debounced monitoring,
 * the organizer that ties them together, the housekeeper module and the
 * programming workflow tracker.
 */

export * as Extraction from './extraction';
export * as Categorization from './categorization';
export * as Naming from './naming';
export * as Mover from './mover';
export * as Monitor from './monitor';
export * as Audit from './audit';
export * as Organizer from './organizer';
export * as Housekeeper from './housekeeper';
export * as Workflow from './workflow';
export * as Config from './config';

export { ConfigError, describeError } from './errors';
export { getLogger, setLogLevel } from './logging';
export type { LogLevel } from './logging';
export { CATEGORIES, FOLDER_KEYS, DEFAULT_FOLDERS, DEFAULT_FILE_CATEGORIES, PROGRAM_NAME, VERSION } from './constants';
export type { Category, FolderKey } from './constants';
