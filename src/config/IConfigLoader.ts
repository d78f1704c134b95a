import { AppConfig } from "./types";

/**
 * Path: src/config/IConfigLoader.ts
 * IConfigLoader interface
 */
export interface IConfigLoader {
    loadConfig(): AppConfig;
}
