export * from "./oracle.types";
