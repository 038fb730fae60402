/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./TrackedFloat.js"
export * from "./Conversion.js"
export * from "./Dimensions.js"
export * from "./Units.js"
export * from "./Catalog.js"
export * from "./Config.js"
export * from "./Converter.js"
