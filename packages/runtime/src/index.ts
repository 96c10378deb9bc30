export * from "./Coordinator";
export * from "./decisionSink";
export * from "./runCycle";
export * from "./startTrader";
export * from "./loadRuntimeConfig";
export { logRiskConfig, logTraderConfig, runtimeLogger } from "./runtimeShared";
