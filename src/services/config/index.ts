/**
 * Configuration service module.
 */

export { ConfigService, type ConfigServiceDeps } from "./config-service";
export { type CoreConfig, DEFAULT_CORE_CONFIG } from "./types";
