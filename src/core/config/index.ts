export * from "./preferences";
export * from "./store";
