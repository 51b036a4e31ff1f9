/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/placesRepo";
export * from "./repos/enrichmentTasksRepo";
export * from "./repos/reviewsRepo";
export * from "./repos/updatesRepo";
export * from "./repos/questionAnswersRepo";
