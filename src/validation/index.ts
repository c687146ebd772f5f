export * from "./common.schema.js";
export * from "./requests.schema.js";
