export * from "./types/color";
export * from "./types/outfit";
export * from "./types/rules";
export * from "./types/analysis";
