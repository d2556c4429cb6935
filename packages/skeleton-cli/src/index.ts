#!/usr/bin/env node
import { CommanderError } from 'commander';
import { SkeletonError } from './errors';
import { createInterface } from './program';

async function main(): Promise<void> {
  const program = createInterface();
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    // Usage errors and help output are already printed by commander.
    process.exitCode = err.exitCode === 0 ? 0 : 2;
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exitCode = err instanceof SkeletonError ? err.exitCode : 1;
});
