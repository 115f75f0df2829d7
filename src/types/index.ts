// Domain types and the constants they are built from
export * from "./repository.js";
export * from "./policy.js";
export * from "./classification.js";
export * from "./reporting.js";
export * from "./auth.js";
