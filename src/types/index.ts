export * from "./logger";
export * from "./json";
export * from "./db";
export * from "./config";
export * from "./enrichment";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/dataForSeo";
