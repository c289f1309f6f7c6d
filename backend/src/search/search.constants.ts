export const SEARCH_OPTIONS_TOKEN = Symbol('SEARCH_OPTIONS');

/** Resolution at which scores are compared; equal steps keep candidate order. */
export const SCORE_EPSILON = 1e-9;
