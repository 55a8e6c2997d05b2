export * from "./program";
export * from "./config";
export * from "./printRecommendations";
export * from "./run";
