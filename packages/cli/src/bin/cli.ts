#!/usr/bin/env node

/**
 * modelbridge CLI
 *
 * Command-line interface for calling embedding and chat models.
 *
 * Usage:
 *   modelbridge embed <text...>     Embed one or more texts
 *   modelbridge chat <message>      Send one chat message
 *   modelbridge check               Validate environment and config file
 */

import { Command } from 'commander';
import { EnvLoader } from '@modelbridge/core';
import { embedCommand } from '../commands/embed';
import { chatCommand } from '../commands/chat';
import { checkCommand } from '../commands/check';

EnvLoader.load();

const program = new Command();

program.name('modelbridge').description('Call embedding and chat models from the command line').version('0.1.0');

// modelbridge embed <text...>
program
  .command('embed <text...>')
  .description('Embed one or more texts')
  .option('-m, --model <model>', 'Embedding model')
  .option('-d, --dimensions <n>', 'Output dimensions (text-embedding-3 models)')
  .option('-p, --provider <provider>', 'Provider (openai, mock)')
  .option('-c, --config <file>', 'Client config file (YAML)')
  .option('--show', 'Print the first values of each vector')
  .option('--async', 'Use the asynchronous client handle')
  .action(async (texts, options) => {
    await embedCommand(texts, options);
  });

// modelbridge chat <message>
program
  .command('chat <message>')
  .description('Send one chat message')
  .option('-m, --model <model>', 'Chat model')
  .option('-s, --system <prompt>', 'System prompt')
  .option('-t, --temperature <value>', 'Sampling temperature')
  .option('--max-tokens <n>', 'Maximum output tokens')
  .option('-p, --provider <provider>', 'Provider (openai, mock)')
  .option('-c, --config <file>', 'Client config file (YAML)')
  .option('--async', 'Use the asynchronous client handle')
  .action(async (message, options) => {
    await chatCommand(message, options);
  });

// modelbridge check
program
  .command('check')
  .description('Validate environment and client configuration')
  .option('-c, --config <file>', 'Client config file to validate')
  .action(async options => {
    await checkCommand(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
