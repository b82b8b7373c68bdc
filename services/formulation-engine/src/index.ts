export * from "./decimal.js";
export * from "./errors.js";
export * from "./number-parser.js";
export * from "./units.js";
export * from "./nutrient-normalizer.js";
export * from "./nutrient-ordering.js";
export * from "./nutrient-calculator.js";
export * from "./models.js";
export * from "./formulation-service.js";
export * from "./cost-engine.js";
export * from "./formulation-mapper.js";
