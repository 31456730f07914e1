export * from "./types";
export { DEFAULT_CONFIG, DEFAULT_SELECTORS, loadConfig } from "./loadConfig";
