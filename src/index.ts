/**
 * @module list-ops
 * Generic list utilities: string/list conversion, concatenation, deduplicating
 * merge, intersection, difference and duplicate detection.
 */

export * from './list-ops';
export * as ListOps from './list-ops';
export { DEFAULT_DELIMITER, WHITE_SPACE_DELIMITER } from './constants';
export { EMPTY, isEmpty, isNotEmpty, emptyList } from './guards';
export { ValueSet, Tuple, hashValue, areEqual, isStructural } from './hash';
export type { Structural } from './hash';
