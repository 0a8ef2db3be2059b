export * from "./client.types";
export * from "./http.types";
