export * from "./time-source";
