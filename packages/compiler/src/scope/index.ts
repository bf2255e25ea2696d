export * from "./scope-arena.js";
export * from "./lexical-scopes.js";
export * from "./global-scope.js";
export * from "./includes.js";
export * from "./signature.js";
export * from "./visible.js";
