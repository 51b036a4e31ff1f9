/**
 * Utils barrel exports
 */

export * from "./errors";
export * from "./time";
export * from "./json/jsonProbe";
