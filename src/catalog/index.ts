export * from "./programCatalog";
export * from "./loader";
