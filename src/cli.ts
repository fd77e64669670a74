#!/usr/bin/env node
import { FALLBACK_JSON } from './lib/display/waybar';
import { logger } from './lib/logger';
import { statusJson } from './lib/main';

// A non-zero exit or a blank line shows as a broken widget: always one JSON line, exit 0
function emit(json: string): void {
  process.stdout.write(`${json}\n`, () => process.exit(0));
}

statusJson().then(emit, (e: unknown) => {
  logger.error('Main', 'Run failed', e);
  emit(FALLBACK_JSON);
});
