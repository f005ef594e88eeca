export * from "./broker";
export * from "./config";
export * from "./logger";
export * from "./service";
