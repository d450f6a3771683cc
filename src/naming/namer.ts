/**
 * Namer
 *
 * Validates file names against PARTNUMBER_REV-X_description.ext and builds
 * canonical suggestions. A suggestion is only offered when every field could
 * be extracted; otherwise the report asks for manual review.
 */

import * as path from 'node:path';
import type { ExtractedFields } from '../extraction/types';
import type { ExtractionInstance } from '../extraction';
import type { NamingReport, NamingViolation } from './types';

export interface NamerInstance {
    validate(filename: string): NamingReport;
    format(fields: ExtractedFields, extension: string): string | undefined;
    isCompliant(filename: string): boolean;
}

export const CANONICAL_PATTERN = /^([A-Z0-9]+(?:-[A-Z0-9]+)*)_REV-([A-Z0-9]{1,3})_([A-Za-z0-9][A-Za-z0-9_-]*)\.([A-Za-z0-9]+)$/;

const DESCRIPTION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export const create = (extractor: ExtractionInstance): NamerInstance => {

    const format = (fields: ExtractedFields, extension: string): string | undefined => {
        const { partNumber, revision, description } = fields;
        if (!partNumber || !revision || !description) return undefined;

        const cleanDescription = description.replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^[-_]+|[-_]+$/g, '');
        if (!DESCRIPTION_PATTERN.test(cleanDescription)) return undefined;

        const ext = extension.replace(/^\./, '').toLowerCase();
        const base = `${partNumber.toUpperCase()}_REV-${revision.toUpperCase()}_${cleanDescription}`;
        return ext ? `${base}.${ext}` : base;
    };

    const isCompliant = (filename: string): boolean =>
        CANONICAL_PATTERN.test(path.basename(filename));

    const validate = (filename: string): NamingReport => {
        const base = path.basename(filename);
        const canonical = CANONICAL_PATTERN.exec(base);

        if (canonical) {
            const extracted = extractor.extract(base);
            return {
                filename: base,
                compliant: true,
                fields: {
                    ...(extracted.fields.customer !== undefined && { customer: extracted.fields.customer }),
                    partNumber: canonical[1],
                    revision: canonical[2],
                    description: canonical[3],
                },
                violations: [],
                needsManualReview: false,
            };
        }

        const extraction = extractor.extract(base);
        const { fields } = extraction;
        const violations: NamingViolation[] = [{
            code: 'non-canonical',
            message: `"${base}" does not follow PARTNUMBER_REV-X_description.ext`,
        }];

        if (!fields.partNumber) {
            violations.push({ code: 'missing-part-number', message: 'No part number found' });
        }
        if (!fields.revision) {
            violations.push({ code: 'missing-revision', message: 'No revision found' });
        }
        if (!fields.description) {
            violations.push({ code: 'missing-description', message: 'No description found' });
        }

        const suggestedName = format(fields, extraction.extension);

        return {
            filename: base,
            compliant: false,
            fields,
            violations,
            ...(suggestedName !== undefined && { suggestedName }),
            needsManualReview: suggestedName === undefined,
        };
    };

    return { validate, format, isCompliant };
};
