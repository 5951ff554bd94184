#!/usr/bin/env node
import { RconCLI, parseArgs } from './cli';

async function main(): Promise<void> {
  const cli = new RconCLI(parseArgs(process.argv.slice(2)));
  await cli.start();
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
