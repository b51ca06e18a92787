/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./Dataset.js"
export * from "./Formula.js"
export * from "./Registry.js"
export * from "./CapabilityResolver.js"
export * from "./ResultsTable.js"
export * from "./ComponentPartitioner.js"
export * from "./ExecutionEngine.js"
export * from "./Statistics.js"
export * from "./Comparison.js"
export * from "./Config.js"
export * from "./Catalog.js"
