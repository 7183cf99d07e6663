#!/usr/bin/env node
import * as readline from 'node:readline';
import { loadConfig } from './config.js';
import { runSession } from './cli/index.js';
import { createCommandContext } from './commands/index.js';
import { logger } from './utils/index.js';

async function main() {
  const config = await loadConfig();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(config.prompt);

  try {
    await runSession(rl, {
      prompt: () => rl.prompt(),
      print: (text) => console.log(text),
    }, {
      context: createCommandContext({ birthdayWindowDays: config.birthdayWindowDays }),
    });
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
