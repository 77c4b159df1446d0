export * from "./synthetic-data";
export * from "./source-manager";
export * from "./composite-source-manager";
export * from "./source.registry";
