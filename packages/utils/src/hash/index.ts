export * from "./md5/index.js";
export * from "./utils/index.js";
