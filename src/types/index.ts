export * from "./logger";
export * from "./catalog";
export * from "./ranking";
export * from "./cli";
