// Side-effect module: first import of every entry point, so RING_ADDRESS,
// BLE_DRIVER, DEBUG and LOG_LEVEL are in place before the logger reads them.
// RING_ENV_FILE points at another file; variables already set are kept.
import { config } from 'dotenv';
import { resolve } from 'node:path';

config({ path: resolve(process.env.RING_ENV_FILE ?? '.env') });
