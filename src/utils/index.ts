export * from "./span";
export * from "./source";
export * from "./fallback";
