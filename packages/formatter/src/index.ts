export * from "./errors";
export * from "./formatter";
