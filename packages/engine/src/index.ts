// Model
export * from "./model/index.js";

// Nodes
export * from "./node/index.js";

// Value resolution
export * from "./resolve/index.js";

// Shared infrastructure
export * from "./shared/index.js";

// Configuration and entry points
export { resolveEngineOptions, type EngineOptions, type EngineOptionsInput } from "./config.js";
export { renderTo, renderTemplate, reconstructTemplate } from "./render.js";
