export * from "./configError";
export * from "./enrichmentConfig";
