#!/usr/bin/env node
import { ConfigurationError } from './errors';
import { createProgram } from './program';

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(err instanceof ConfigurationError ? `Configuration error: ${message}` : message);
  process.exitCode = 1;
});
