#!/usr/bin/env node

import { runCli } from './commands/run.js';

/**
 * docprompt CLI.
 *
 * Usage:
 *   docprompt templates list --tag code
 *   docprompt templates run "Code Review" language=python code="$(cat app.py)"
 *   docprompt analyze sentiment review.txt --json
 *   docprompt metadata article.txt
 */

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error('\nError:', error instanceof Error ? error.message : error);
  process.exit(1);
});
