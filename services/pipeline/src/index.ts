#!/usr/bin/env -S node --import tsx
import { createLogger } from '@nyc311/shared';
import { createInterface } from './program';

async function main(): Promise<void> {
  const program = createInterface();
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  createLogger().fatal({ err }, message);
  process.exitCode = 1;
});
