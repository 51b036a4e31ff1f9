/**
 * DataForSEO client public API
 */

export { DataForSeoClient } from "./dataForSeoClient";
export type { DataForSeoClientConfig } from "./dataForSeoClient";
export { CredentialCache } from "./credentialCache";
export type { CredentialLoader } from "./credentialCache";
export { DataForSeoError } from "./dataForSeoError";
export { parseReadyResponse, parseSubmitResponse, parseTaskResponse } from "./mappers";
