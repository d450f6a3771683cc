/**
 * Naming Convention Types
 */

import type { ExtractedFields } from '../extraction/types';

export type NamingViolationCode =
    | 'non-canonical'
    | 'missing-part-number'
    | 'missing-revision'
    | 'missing-description';

export interface NamingViolation {
    code: NamingViolationCode;
    message: string;
}

export interface NamingReport {
    filename: string;
    compliant: boolean;
    fields: ExtractedFields;
    violations: NamingViolation[];
    /** Canonical name built from extracted fields; absent when a field is missing */
    suggestedName?: string;
    /** True when the name is non-compliant and no suggestion could be built */
    needsManualReview: boolean;
}
