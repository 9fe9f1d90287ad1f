#!/usr/bin/env tsx
import { runCli } from "./commands";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
