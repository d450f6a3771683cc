/**
 * Pattern Extraction
 *
 * Entry point for filename field extraction.
 */

import type { NamingPattern } from './types';
import * as Extractor from './extractor';

export type ExtractionInstance = Extractor.ExtractorInstance;

export const create = (patterns?: NamingPattern[]): ExtractionInstance => {
    return Extractor.create(patterns);
};

export { DEFAULT_PATTERNS, isRevisionToken } from './patterns';
export * from './types';
