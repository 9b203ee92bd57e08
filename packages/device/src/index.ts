export * from "./channel.js";
export type * from "./types.js";
