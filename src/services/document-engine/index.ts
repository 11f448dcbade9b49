// document-engine/index.ts
// ---------------------------------------------------------------------------
// Entry point for the standalone document-engine module.
// Re-exports the public API of every stage plus the pipeline.

export * from "./01_extractTokens";
export * from "./02_detectLayout";
export * from "./03_buildLines";
export * from "./04_buildParagraphs";
export * from "./05_classifyHeaders";
export * from "./06_parseHonorific";
export * from "./07_assembleRecords";
export * from "./08_exportRecords";
export * from "./99_processDocument";
