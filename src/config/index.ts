/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated; runtime limits live in defaults.ts.
 */

export { TIMEOUTS, LIMITS, TOKEN_GUARDS } from './defaults.js';
export { loadConfigFile, parseConfig, parseCookies } from './loader.js';
export type { SeedCookie } from './loader.js';
