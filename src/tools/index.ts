/**
 * Tools system - public API.
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./define.ts";
export * from "./params.ts";
export * from "./registry.ts";
export * from "./executor.ts";
export * from "./catalog.ts";
export * from "./builder.ts";
export * from "./toolkit.ts";
export * from "./builtins/index.ts";
