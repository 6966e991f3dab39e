/**
 * Configuration entry point
 */

export { createAppConfig, type AppConfig } from './app-config';
