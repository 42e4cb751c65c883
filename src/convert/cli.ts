#!/usr/bin/env node
/**
 * v1 → v2 Checklist Converter CLI
 *
 * Usage:
 *   Development: npx tsx src/convert/cli.ts --output=./v2 --services=./services.json ./checklists
 *   Production:  node dist/convert/cli.js --format=json --overwrite ./checklists/aks_checklist.en.json
 */

import { convertConfig } from '../config.js';
import { runCli } from './command.js';

try {
  process.exitCode = runCli(process.argv.slice(2), convertConfig);
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
