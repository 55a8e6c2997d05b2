export * from "./featureSpace";
export * from "./similarity";
export * from "./recommender";
