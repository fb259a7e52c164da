export { DEFAULT_CONFIG, loadConfig } from "./loadConfig";
export type { AppConfig, NamingMode } from "./types";
