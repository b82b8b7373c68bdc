export * from "./nutrients.js";
export * from "./schemas.js";
