export * from "./types";
export * from "./errors";
export * from "./symbols";
export * from "./config";
export * from "./exchange";
export * from "./strategies/ids";
export * from "./strategies/selection";
export * from "./utils/logger";
