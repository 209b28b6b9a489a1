#!/usr/bin/env node
import dotenv from "dotenv";
import { createProgram } from "./cli";
import { formatError } from "./errors";
import { loadSettings } from "./settings";

dotenv.config();

// Exit on interrupt so held locks are released by the exit hook; an
// in-flight write either already renamed or leaves the target untouched.
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => process.exit(130));
}

async function main(): Promise<void> {
  const program = createProgram({ settings: loadSettings() });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(formatError(err));
  process.exitCode = 1;
});
