export * from "./health.types";
