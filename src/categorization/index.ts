/**
 * Categorization
 *
 * Entry point for extension-based file categorization.
 */

import { DEFAULT_FILE_CATEGORIES, DEFAULT_FOLDERS } from '../constants';
import type { CategorizerConfig } from './types';
import * as Categorizer from './categorizer';

export type CategorizationInstance = Categorizer.CategorizerInstance;

export const DEFAULT_CATEGORIZER_CONFIG: CategorizerConfig = {
    categories: DEFAULT_FILE_CATEGORIES,
    folders: DEFAULT_FOLDERS,
};

export const create = (config: CategorizerConfig = DEFAULT_CATEGORIZER_CONFIG): CategorizationInstance => {
    return Categorizer.create(config);
};

export { normalizeExtension } from './categorizer';
export * from './types';
