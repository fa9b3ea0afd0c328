export * from "./hash/index.js";
export * from "./io/index.js";
