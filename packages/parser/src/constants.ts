/**
 * Constants used by the extraction layer.
 */

// Name given to variable elements whose binding is not a plain identifier
// (e.g. destructuring patterns).
export const ANONYMOUS_NAME = '<anonymous>';

// Caller recorded for calls that sit outside every named function.
export const MODULE_CALLER = '<module>';

// Separator between the segments of a qualified name.
export const QUALIFIED_NAME_SEPARATOR = '.';

// Leading characters of a declaration inspected for modifier keywords.
export const MODIFIER_SCAN_LENGTH = 50;
