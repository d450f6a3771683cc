/**
 * Pattern Extractor
 *
 * Pulls customer, revision, part number and description out of a file name
 * using ordered regex patterns. For each field the earliest pattern that
 * matches wins. Tokens claimed by one field are masked before the next field
 * is searched, so a revision suffix never ends up inside a part number.
 */

import * as path from 'node:path';
import type { ExtractedField, ExtractedFields, ExtractionResult, NamingPattern } from './types';
import { DEFAULT_PATTERNS, isRevisionToken } from './patterns';
import * as Logging from '../logging';

export interface ExtractorInstance {
    extract(filename: string): ExtractionResult;
    getPatterns(): NamingPattern[];
}

interface CompiledPattern {
    pattern: NamingPattern;
    regex: RegExp;
}

interface TokenMatch {
    value: string;
    start: number;
    end: number;
}

const FIELD_ORDER: ExtractedField[] = ['customer', 'revision', 'partNumber'];

export const compile = (patterns: NamingPattern[]): CompiledPattern[] =>
    patterns.map(pattern => {
        try {
            return { pattern, regex: new RegExp(pattern.source, 'gi') };
        } catch (error) {
            throw new Error(`Invalid ${pattern.field} pattern "${pattern.name}": ${error instanceof Error ? error.message : String(error)}`);
        }
    });

export const create = (patterns: NamingPattern[] = DEFAULT_PATTERNS): ExtractorInstance => {
    const logger = Logging.getLogger();
    const compiled = compile(patterns);

    const findToken = (text: string, entry: CompiledPattern): TokenMatch | undefined => {
        for (const match of text.matchAll(entry.regex)) {
            const value = match.slice(1).find(group => group !== undefined);
            if (value === undefined || match.index === undefined) continue;

            // A part-number candidate that reads as a revision belongs to the revision field
            if (entry.pattern.field === 'partNumber' && isRevisionToken(value)) continue;

            return { value, start: match.index, end: match.index + match[0].length };
        }
        return undefined;
    };

    const mask = (text: string, token: TokenMatch): string =>
        text.slice(0, token.start) + '_'.repeat(token.end - token.start) + text.slice(token.end);

    const describe = (masked: string): string | undefined => {
        const words = masked
            .split(/[_\s]+/)
            .map(word => word.replace(/^[-.]+|[-.]+$/g, ''))
            .filter(word => word.length > 0);
        return words.length > 0 ? words.join('_') : undefined;
    };

    const normalize = (field: ExtractedField, value: string): string =>
        field === 'customer' ? value.trim() : value.toUpperCase();

    const extract = (filename: string): ExtractionResult => {
        const base = path.basename(filename);
        const extension = path.extname(base);
        const stem = extension ? base.slice(0, -extension.length) : base;

        const fields: ExtractedFields = {};
        const matchedPatterns: Partial<Record<ExtractedField, string>> = {};
        let working = stem;

        for (const field of FIELD_ORDER) {
            for (const entry of compiled) {
                if (entry.pattern.field !== field) continue;

                const token = findToken(working, entry);
                if (!token) continue;

                fields[field] = normalize(field, token.value);
                matchedPatterns[field] = entry.pattern.name;
                working = mask(working, token);
                break;
            }
        }

        const description = describe(working);
        if (description) {
            fields.description = description;
        }

        logger.debug('Extracted fields from %s: %s', base, JSON.stringify(fields));

        return {
            filename: base,
            stem,
            extension: extension.toLowerCase(),
            fields,
            matchedPatterns,
        };
    };

    return {
        extract,
        getPatterns: () => compiled.map(entry => entry.pattern),
    };
};
