/**
 * Default ceiling on nesting (validation) and path length (resolution).
 */
export const DEFAULT_MAX_DEPTH = 1000;
