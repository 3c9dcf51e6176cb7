export * from "./json.js";
export * from "./ecosystem.js";
export * from "./request.js";
export * from "./component.js";
export * from "./output.js";
