export * from "./crawlState";
export * from "./driver";
export * from "./events";
export * from "./hybrid";
export * from "./prober";
export * from "./references";
export * from "./summary";
export * from "./throttle";
export * from "./traversal";
export type * from "./types";
