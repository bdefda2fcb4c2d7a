#!/usr/bin/env npx tsx
/**
 * CLI wrapper for the multi-resolution map build
 */
import fs from 'fs';
import dotenv from 'dotenv';
import { CLI_USAGE, loadConfig } from '../src/lib/config';
import { ConfigurationError, InputValidationError, formatError } from '../src/lib/errors';
import { MapPipeline } from '../src/lib/pipeline';

dotenv.config();

async function main() {
  let loaded: ReturnType<typeof loadConfig>;
  try {
    loaded = loadConfig(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ Invalid configuration:`);
      for (const issue of error.issues) console.error(`   - ${issue}`);
      console.error(`   Run with --help for usage.`);
      process.exit(1);
    }
    throw error;
  }

  const { config, help, ignored } = loaded;
  if (help) {
    console.log(CLI_USAGE);
    process.exit(0);
  }
  for (const arg of ignored) {
    console.warn(`⚠️ Unknown argument ignored: ${arg}`);
  }

  if (!fs.existsSync(config.input)) {
    console.error(`❌ Input file not found: ${config.input}`);
    process.exit(1);
  }

  console.log(`🚀 Building map...`);
  console.log(`   Input:  ${config.input}`);
  console.log(`   Output: ${config.outputDir}/`);
  console.log(`   Resolutions: ${config.resolutions.join(', ')}, Layout: ${config.layout.resolution}`);
  console.log(`   Density: ${config.density.method}, Representatives: ${config.representative.strategy}/${config.representative.hierarchy}`);

  try {
    const summary = await new MapPipeline(config).run();
    console.log(`\n🎉 Done! ${summary.items.toLocaleString()} items, ${summary.files.length} files.`);
  } catch (error) {
    if (error instanceof InputValidationError) {
      console.error(`❌ ${error.issues.length} invalid input row(s):`);
      for (const issue of error.issues) {
        console.error(`   - row ${issue.row}${issue.id ? ` (${issue.id})` : ''}: ${issue.reason}`);
      }
    } else {
      console.error(`❌ ${formatError(error)}`);
      if (error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`❌ ${formatError(error)}`);
  process.exit(1);
});
