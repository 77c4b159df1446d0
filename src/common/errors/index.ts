export * from "./source-errors";
