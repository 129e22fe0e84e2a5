#!/usr/bin/env -S npx tsx
import { runCli } from './program';

async function main() {
  process.exitCode = await runCli(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
