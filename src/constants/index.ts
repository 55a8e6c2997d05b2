export * from "./logger";
export * from "./textNormalization";
export * from "./catalog";
export * from "./ranking";
