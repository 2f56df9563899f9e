export * from "./rpc";
export * from "./ingestion-client";
