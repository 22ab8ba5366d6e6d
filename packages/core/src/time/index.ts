export * from "./constants";
export * from "./dates";
