export * from "./binary.js";
