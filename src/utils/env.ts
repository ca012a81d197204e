import fs from 'fs';
import path from 'path';
import { logger } from './logger';

const ENV_LOADED = Symbol.for('MAPS_SCRAPER_ENV_LOADED');

export function loadEnv(envFile: string = path.resolve(process.cwd(), '.env')) {
  const registry = global as typeof globalThis & Record<symbol, boolean | undefined>;
  if (registry[ENV_LOADED]) {
    return;
  }

  if (fs.existsSync(envFile)) {
    const content = fs.readFileSync(envFile, 'utf-8');
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;
      const [key, ...rest] = trimmed.split('=');
      const value = rest.join('=').trim();
      if (key && !(key in process.env)) {
        process.env[key.trim()] = value;
      }
    }
    logger.setLevel(process.env.LOG_LEVEL);
    logger.info('Environment variables loaded from .env');
  }

  registry[ENV_LOADED] = true;
}
