export * from "./errors.js";
export * from "./vocabulary.js";
export * from "./graphStore.js";
export * from "./recordParser.js";
export * from "./entityBuilder.js";
export * from "./spatialIndex.js";
export * from "./geoBounds.js";
export * from "./boundsFilter.js";
export * from "./ingest.js";
export * from "./serializers.js";
export * from "./report.js";
export type { Logger } from "./logger.js";
