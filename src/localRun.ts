import { config } from 'dotenv';
config();

import process from 'process';
import console from 'console';
import { loadConfig } from './config/env';
import { handler } from './handlers/weatherHandler';

(async () => {
  const result = await handler(loadConfig());
  process.exitCode = result.status === 200 ? 0 : 1;
})().catch((err: unknown) => {
  console.error('Weather run aborted:', err);
  process.exitCode = 1;
});
