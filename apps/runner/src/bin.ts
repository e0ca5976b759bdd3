#!/usr/bin/env node

/**
 * Runner entry point.
 *
 *   textscope -f notes.txt -w -s
 *   textscope -i flags.txt
 */

import { runCli } from "./cli.js";

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
