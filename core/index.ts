export * from "./types";
export * from "./cards";
export * from "./config";
export * from "./errors";
export * from "./game";
export * from "./hand";
export * from "./logger";
export * from "./rng";
export * from "./shoe";
export * from "./simulate";
export * from "./stats";
export * from "./strategy";
