/**
 * Feedcast — List Sources Script
 *
 * Usage:
 *   npm run sources
 *   npm run sources -- --country UK --category Technology
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { loadSourceRegistry } from '../src/feeds/registry';

interface ListOptions {
  country?: string;
  category?: string;
}

function parseArgs(): ListOptions {
  const args = process.argv.slice(2);
  const options: ListOptions = {};

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--country' && value) {
      options.country = value;
      i++;
    } else if (args[i] === '--category' && value) {
      options.category = value;
      i++;
    }
  }

  return options;
}

function listSources(): void {
  const options = parseArgs();

  let sourcesFile: string;
  try {
    sourcesFile = loadConfig().sourcesFile;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Invalid configuration:');
      for (const issue of error.issues) console.error(`  - ${issue}`);
      process.exit(1);
    }
    throw error;
  }

  const registry = loadSourceRegistry(sourcesFile);
  const sources = registry.sourcesFor(options.country, options.category);

  if (sources.length === 0) {
    console.log('No sources match.');
    return;
  }

  let currentGroup = '';
  for (const source of sources) {
    const group = `${source.country} / ${source.category}`;
    if (group !== currentGroup) {
      console.log(`\n${group}`);
      currentGroup = group;
    }
    console.log(`  - ${source.name}: ${source.endpointUrl}`);
  }

  console.log(`\n${sources.length} source(s)`);
}

listSources();
