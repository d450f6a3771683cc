/**
 * Pattern Extraction Types
 */

export type ExtractedField = 'customer' | 'revision' | 'partNumber';

/**
 * A single ordered pattern. `source` is compiled case-insensitively; the
 * first capture group that participated in the match is the field value and
 * the whole match is the token removed before the next field is searched.
 */
export interface NamingPattern {
    name: string;
    field: ExtractedField;
    source: string;
}

export interface ExtractedFields {
    customer?: string;
    partNumber?: string;
    revision?: string;
    description?: string;
}

export interface ExtractionResult {
    filename: string;
    stem: string;
    extension: string;
    fields: ExtractedFields;
    matchedPatterns: Partial<Record<ExtractedField, string>>;
}
