/**
 * Categorizer
 *
 * Maps a file extension onto one of the shop categories. The lookup is total:
 * anything the table does not know goes to HOLDING.
 */

import * as path from 'node:path';
import type { Category, CategorizerConfig, CategoryRule, FolderKey } from './types';
import { CATEGORIES } from '../constants';
import { ConfigError } from '../errors';

export interface CategorizerInstance {
    categorize(extension: string): Category;
    categorizeFile(filePath: string): Category;
    folderFor(category: Category): string;
    getRules(): CategoryRule[];
}

export const normalizeExtension = (extension: string): string => {
    const trimmed = extension.trim().toLowerCase();
    if (trimmed === '') return '';
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
};

export const buildRules = (config: CategorizerConfig): Map<string, Category> => {
    const rules = new Map<string, Category>();

    for (const category of CATEGORIES) {
        for (const raw of config.categories[category] ?? []) {
            const extension = normalizeExtension(raw);
            if (extension === '') continue;

            const existing = rules.get(extension);
            if (existing && existing !== category) {
                throw new ConfigError(`Extension ${extension} is mapped to both ${existing} and ${category}`);
            }
            rules.set(extension, category);
        }
    }

    return rules;
};

export const create = (config: CategorizerConfig): CategorizerInstance => {
    const rules = buildRules(config);

    const categorize = (extension: string): Category =>
        rules.get(normalizeExtension(extension)) ?? 'HOLDING';

    const categorizeFile = (filePath: string): Category =>
        categorize(path.extname(filePath));

    const folderFor = (category: Category): string => {
        const key: FolderKey = category;
        return config.folders[key];
    };

    const getRules = (): CategoryRule[] =>
        Array.from(rules.entries()).map(([extension, category]) => ({ extension, category }));

    return { categorize, categorizeFile, folderFor, getRules };
};
