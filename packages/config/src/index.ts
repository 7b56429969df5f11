/**
 * Dugout Config
 *
 * Turns environment variables into a validated DugoutConfig. Apps load
 * `.env` through dotenv before calling loadConfig; packages below the apps
 * receive the config object and never read process.env themselves.
 */

export { loadConfig, ConfigError, DEFAULT_TRADE_DEADLINE } from './config.js';
