export * from "./baseProvider";
export * from "./httpProvider";
export * from "./wikidataProvider";
export * from "./wikipediaProvider";
export * from "./proxy";
export type { GraphQuery, GraphRow, SummaryFetch } from "./types";
