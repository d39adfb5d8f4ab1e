/**
 * Feedcast — Run Broadcast Script
 *
 * Sends the daily digest to every eligible subscriber right now.
 *
 * Usage:
 *   npm run broadcast                 # Deliver through the configured transport
 *   npm run broadcast -- --dry-run    # Print digests instead of sending them
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { logger, errorMessage } from '../src/lib/logger';
import { buildServices } from '../src/bootstrap';
import { ConsoleTransport } from '../src/delivery/telegram';

interface BroadcastScriptOptions {
  dryRun: boolean;
}

function parseArgs(): BroadcastScriptOptions {
  const args = process.argv.slice(2);
  return { dryRun: args.includes('--dry-run') };
}

async function runBroadcast(): Promise<void> {
  const options = parseArgs();
  const startTime = Date.now();

  console.log('\n' + '='.repeat(60));
  console.log('FEEDCAST BROADCAST');
  console.log('='.repeat(60));
  console.log(`Started: ${new Date().toISOString()}`);
  console.log(`Dry Run: ${options.dryRun}`);
  console.log('='.repeat(60) + '\n');

  try {
    const config = loadConfig();
    const services = buildServices(config, {
      transport: options.dryRun ? new ConsoleTransport() : undefined,
    });

    const result = await services.scheduler.trigger();
    const records = result.status === 'completed' ? result.records : [];
    const sent = records.filter(r => r.outcome === 'success').length;
    const failed = records.filter(r => r.outcome === 'failure').length;
    const skipped = records.filter(r => r.outcome === 'skipped').length;

    for (const record of records.filter(r => r.outcome === 'failure')) {
      console.log(`  ✗ ${record.subscriberId}: ${record.error ?? 'unknown error'}`);
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log('\n' + '='.repeat(60));
    console.log('BROADCAST COMPLETE');
    console.log('='.repeat(60));
    console.log(`Duration: ${duration}s`);
    console.log(`Delivered: ${sent}/${records.length}`);
    if (skipped > 0) console.log(`Skipped (no news): ${skipped}`);
    console.log('='.repeat(60) + '\n');

    if (failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Invalid configuration:');
      for (const issue of error.issues) console.error(`  - ${issue}`);
    } else {
      logger.error('Broadcast failed', { error: errorMessage(error) });
    }
    process.exit(1);
  }
}

void runBroadcast();
