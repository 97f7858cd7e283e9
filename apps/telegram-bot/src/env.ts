/**
 * Loads the repository's .env into process.env.
 *
 * Must stay the entry point's first import: the shared logger reads
 * LOG_LEVEL and NODE_ENV when its module is evaluated.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(__dirname, '../../..');

dotenvConfig({ path: resolve(repoRoot, '.env') });
