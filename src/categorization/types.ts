/**
 * Categorization Types
 */

import type { Category, FolderKey } from '../constants';

export type { Category, FolderKey };

export type CategoryTable = Partial<Record<Category, string[]>>;

export type FolderMap = Record<FolderKey, string>;

export interface CategorizerConfig {
    categories: CategoryTable;
    folders: FolderMap;
}

export interface CategoryRule {
    extension: string;
    category: Category;
}
