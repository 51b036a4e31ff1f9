export * from "./reviewsParser";
export * from "./businessInfoParser";
export * from "./updatesParser";
export * from "./questionsAndAnswersParser";
export * from "./socialProfilesParser";
export { parseProviderTimestamp } from "./shared";
