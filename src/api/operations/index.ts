export * from "./shared";
export * from "./calls";
export * from "./batches";
export * from "./pathways";
export * from "./pathwayVersions";
export * from "./pathwayChat";
export * from "./folders";
export * from "./phoneNumbers";
export * from "./voices";
export * from "./customTools";
export * from "./webAgents";
export * from "./encryptedKeys";
