import { describe, it, expect, vi } from 'vitest';
import * as Naming from '../../src/naming';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Namer', () => {
    const namer = Naming.create();

    describe('validate', () => {
        it('should accept a canonical name', () => {
            const report = namer.validate('ABC-123_REV-A_housing.step');

            expect(report.compliant).toBe(true);
            expect(report.violations).toEqual([]);
            expect(report.needsManualReview).toBe(false);
            expect(report.fields).toEqual({
                partNumber: 'ABC-123',
                revision: 'A',
                description: 'housing',
            });
        });

        it('should keep a multi-word description intact', () => {
            const report = namer.validate('ABC-123_REV-2_top_plate-left.nc');
            expect(report.compliant).toBe(true);
            expect(report.fields.description).toBe('top_plate-left');
        });

        it('should flag a non-canonical name and suggest the canonical one', () => {
            const report = namer.validate('[ACME Corp] 4411 rev B bracket.NC');

            expect(report.compliant).toBe(false);
            expect(report.violations.map(v => v.code)).toEqual(['non-canonical']);
            expect(report.suggestedName).toBe('4411_REV-B_bracket.nc');
            expect(report.needsManualReview).toBe(false);
            expect(report.fields.customer).toBe('ACME Corp');
        });

        it('should list missing fields and ask for manual review', () => {
            const report = namer.validate('bracket.nc');

            expect(report.compliant).toBe(false);
            expect(report.violations.map(v => v.code)).toEqual([
                'non-canonical',
                'missing-part-number',
                'missing-revision',
            ]);
            expect(report.suggestedName).toBeUndefined();
            expect(report.needsManualReview).toBe(true);
        });

        it('should describe the expected format in the first violation', () => {
            const report = namer.validate('bracket.nc');
            expect(report.violations[0]?.message).toBe('"bracket.nc" does not follow PARTNUMBER_REV-X_description.ext');
        });

        it('should treat a lower-case revision label as non-canonical', () => {
            const report = namer.validate('ABC-123_rev-A_housing.step');
            expect(report.compliant).toBe(false);
            expect(report.suggestedName).toBe('ABC-123_REV-A_housing.step');
        });
    });

    describe('format', () => {
        it('should build a canonical name with a lower-case extension', () => {
            expect(namer.format({ partNumber: 'abc-123', revision: 'a', description: 'housing' }, '.STEP'))
                .toBe('ABC-123_REV-A_housing.step');
        });

        it('should replace characters outside the description alphabet', () => {
            expect(namer.format({ partNumber: '4411', revision: 'B', description: 'top plate (left)' }, 'nc'))
                .toBe('4411_REV-B_top-plate-left.nc');
        });

        it('should return undefined when a field is missing', () => {
            expect(namer.format({ partNumber: '4411', description: 'bracket' }, '.nc')).toBeUndefined();
        });

        it('should produce names that validate as compliant', () => {
            const name = namer.format({ partNumber: 'PN-1', revision: '10', description: 'base' }, '.dxf');
            expect(name).toBe('PN-1_REV-10_base.dxf');
            expect(namer.isCompliant(name ?? '')).toBe(true);
        });
    });

    describe('isCompliant', () => {
        it('should check only the base name', () => {
            expect(namer.isCompliant('/shop/CAD/ABC-123_REV-A_housing.step')).toBe(true);
            expect(namer.isCompliant('/shop/CAD/housing.step')).toBe(false);
        });
    });
});
