// Imported first by the entry point so every later module sees .env values.
import { config as loadEnv } from 'dotenv';
import { fileURLToPath } from 'node:url';

loadEnv({ path: fileURLToPath(new URL('../../../.env.local', import.meta.url)) });
loadEnv({ path: fileURLToPath(new URL('../../../.env', import.meta.url)) });
