/**
 * Naming Convention
 *
 * Entry point for canonical file name validation and suggestion.
 */

import * as Extraction from '../extraction';
import * as Namer from './namer';

export type NamingInstance = Namer.NamerInstance;

export const create = (extractor: Extraction.ExtractionInstance = Extraction.create()): NamingInstance => {
    return Namer.create(extractor);
};

export { CANONICAL_PATTERN } from './namer';
export * from './types';
