export * from "./logger";
export * from "./enrichment";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/dataForSeo";
