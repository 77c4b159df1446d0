/**
 * Config Module Exports
 */

// Services
export { ConfigService, type ConfigServiceOptions, type ConfigStatus } from "./config.service";
export { type ConfigTree, type ConfigValue, PLACEHOLDER_WEATHER_API_KEY } from "./config.defaults";

// Module
export { ConfigModule } from "./config.module";

// Environment
export { ENV, ENV_HELPERS } from "./environment.constants";
