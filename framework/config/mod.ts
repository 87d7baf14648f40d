/**
 * Configuration & Environment Management
 *
 * Router settings from defaults, a JSON file and environment variables.
 */

export { Config, type ConfigOptions, loadConfig } from './config.ts';
