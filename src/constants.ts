/** Separator used by `join` and `split` when none is given. */
export const DEFAULT_DELIMITER = ',';

export const WHITE_SPACE_DELIMITER = ' ';
