export * from "./SignalEngine";
export * from "./BreakoutSignalEngine";
export * from "./CrossoverSignalEngine";
export * from "./SessionGatedSignalEngine";
export * from "./strategyEngine";
