export * from "./ccxtMarketDataSource";
export * from "./exchange";
export * from "./utils/ccxtMapper";
