/**
 * Load .env.local (and .env) before any other imports that read env at module
 * load (model names, API keys, timeouts). Import this first in scripts.
 */
import { config } from 'dotenv';
import path from 'path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
