/**
 * Environment loader — must be imported FIRST in index.ts so that
 * process.env is populated before any module reads it.
 *
 * Production: env vars injected by the platform, no files needed.
 * Local dev: reads .env.local then .env from the repository root.
 */
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

if (process.env.NODE_ENV !== 'production') {
  const paths = [resolve(__dirname, '../../../.env.local'), resolve(__dirname, '../../../.env')];
  for (const p of paths) {
    if (existsSync(p)) config({ path: p });
  }
}
