/**
 * Name CLI Commands
 *
 * Check file names against the canonical PART_REV-X_description.ext convention.
 */

/* eslint-disable no-console */
import { Command } from 'commander';
import * as Naming from '../naming';
import type { NamingReport } from '../naming';

export const formatReport = (report: NamingReport): string[] => {
    if (report.compliant) {
        return [`OK       ${report.filename}`];
    }

    const lines = [`INVALID  ${report.filename}`];
    for (const violation of report.violations) {
        lines.push(`  - ${violation.message}`);
    }
    lines.push(report.suggestedName !== undefined
        ? `  Suggested: ${report.suggestedName}`
        : '  Manual review required');
    return lines;
};

/**
 * Register name commands
 */
export const registerNameCommands = (program: Command): void => {
    const name = program
        .command('name')
        .description('Check and build canonical file names');

    name
        .command('check <filenames...>')
        .description('Validate file names and suggest canonical replacements')
        .addHelpText('after', `
Examples:
  shopfloor name check ABC-123_REV-A_housing.step
  shopfloor name check "[ACME] 4411 rev B bracket.nc" PN-7720_R2_plate.dxf
`)
        .action((filenames: string[]) => {
            const namer = Naming.create();
            const reports = filenames.map(filename => namer.validate(filename));

            for (const report of reports) {
                formatReport(report).forEach(line => console.log(line));
            }

            const invalid = reports.filter(report => !report.compliant).length;
            console.log(`\n${reports.length - invalid} of ${reports.length} name(s) compliant`);
            if (invalid > 0) {
                process.exitCode = 1;
            }
        });

    name
        .command('format <partNumber> <revision> <description> <extension>')
        .description('Build a canonical file name from its parts')
        .action((partNumber: string, revision: string, description: string, extension: string) => {
            const formatted = Naming.create().format({ partNumber, revision, description }, extension);
            if (formatted === undefined) {
                console.error('Error: Cannot build a canonical name from the given parts');
                process.exit(1);
            }
            console.log(formatted);
        });
};
