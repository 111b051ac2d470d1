export * from "./clock.js"
export * from "./entries.js"
export * from "./directory.js"
export * from "./safety.js"
export * from "./system.js"
