export * from "./json.js";
export * from "./entry-point.js";
export * from "./extension.js";
