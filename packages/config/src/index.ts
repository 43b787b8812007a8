import 'dotenv/config';
import { loadConfig } from './env.js';

export { loadConfig, envSchema, ConfigError, type AppConfig } from './env.js';

export const config = loadConfig(process.env);
