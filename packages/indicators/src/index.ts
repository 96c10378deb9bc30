export * from "./rolling";
export * from "./ema";
export * from "./atr";
export * from "./rsi";
export * from "./macd";
export * from "./bollinger";
export * from "./momentum";
export * from "./pipeline";
