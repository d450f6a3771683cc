import type { NamingPattern } from './types';

// Token boundaries. Lookbehind/lookahead keep the separators out of the match
const START = '(?<=^|[_\\s])';
const START_OR_DOT = '(?<=^|[_\\s.])';
const END = '(?=[_\\s.-]|$)';
const END_STRICT = '(?=[_\\s.]|$)';
const PART_TOKEN = '[A-Z0-9]+(?:-[A-Z0-9]+)*';

/**
 * Default patterns, in priority order per field. Customer is searched first,
 * then revision, then part number, each on the name with earlier tokens masked.
 */
export const DEFAULT_PATTERNS: NamingPattern[] = [
    { name: 'bracketed', field: 'customer', source: '^\\[\\s*([^\\]]*[^\\]\\s])\\s*\\]' },
    { name: 'double-underscore', field: 'customer', source: '^([A-Z0-9][A-Z0-9 &.-]*?)__' },

    { name: 'rev-token', field: 'revision', source: `(?<=^|[_\\s.-])REV(?:[-_ ]([A-Z0-9]{1,3})|([A-Z]|\\d{1,3}))${END_STRICT}` },
    { name: 'r-number', field: 'revision', source: `${START_OR_DOT}R(\\d{1,3})${END_STRICT}` },
    { name: 'v-number', field: 'revision', source: `${START_OR_DOT}V(\\d{1,3})${END_STRICT}` },

    { name: 'labelled', field: 'partNumber', source: `${START}(?:PN|PART)[-_#\\s]?(?=[A-Z0-9-]*\\d)(${PART_TOKEN})${END}` },
    { name: 'leading-token', field: 'partNumber', source: `^[_\\s]*(?=[A-Z0-9-]*\\d)(${PART_TOKEN})${END}` },
    { name: 'letters-digits', field: 'partNumber', source: `${START}([A-Z]{1,5}-?\\d{2,}(?:-[A-Z0-9]+)*)${END}` },
    { name: 'numeric', field: 'partNumber', source: `${START}(\\d{4,}(?:-\\d+)*)${END}` },
];

const REVISION_TOKEN = /^(?:REV[-_ ]?[A-Z0-9]{1,3}|R\d{1,3}|V\d{1,3})$/i;

export const isRevisionToken = (token: string): boolean => REVISION_TOKEN.test(token);
