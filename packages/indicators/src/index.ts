export * from "./sma";
export * from "./ema";
export * from "./rsi";
export * from "./atr";
export * from "./supertrend";
export * from "./obv";
export * from "./ad";
export * from "./volumeSurge";
export * from "./computeIndicators";
