/**
 * @rangewise/algorithms - predicate-driven algorithms over cursor ranges
 */

export * from "./array-cursor.mjs";
export * from "./binary-search.mjs";
export * from "./comparison.mjs";
export * from "./errors.mjs";
export * from "./linear-scan.mjs";
export * from "./tracing.mjs";
export * from "./types.mjs";
