/**
 * Embed Command
 *
 * Embeds one or more texts and prints the vector summary.
 *
 * Usage:
 *   modelbridge embed "first text" "second text"
 *   modelbridge embed "query" --dimensions 256 --show
 */

import chalk from 'chalk';
import ora from 'ora';
import { ModelType, type EmbedderModelKwargs } from '@modelbridge/core';
import {
  DEFAULT_EMBEDDING_MODEL,
  parseNumberOption,
  reportFailure,
  setupClient,
  type ClientCommandOptions,
} from './shared';

export interface EmbedCommandOptions extends ClientCommandOptions {
  model?: string;
  dimensions?: string;
  show?: boolean;
  async?: boolean;
}

const PREVIEW_LENGTH = 5;

export async function embedCommand(texts: string[], options: EmbedCommandOptions): Promise<void> {
  console.log(chalk.bold('\n🧮 modelbridge - Embed\n'));

  const spinner = ora('Loading configuration...').start();

  try {
    const { client, config } = setupClient(options);

    const dimensions = parseNumberOption('dimensions', options.dimensions);
    const modelKwargs: EmbedderModelKwargs = {
      ...config.embedder,
      model: options.model ?? config.embedder?.model ?? DEFAULT_EMBEDDING_MODEL,
      ...(dimensions !== undefined ? { dimensions } : {}),
    };

    const input = texts.length === 1 ? texts[0] : texts;
    const request = client.buildRequest(input, modelKwargs, ModelType.EMBEDDER);

    spinner.text = `Calling ${modelKwargs.model} (${client.provider})...`;
    const response = options.async
      ? await client.callAsync(request, ModelType.EMBEDDER)
      : await client.call(request, ModelType.EMBEDDER);
    client.destroy();

    if (!('data' in response)) {
      throw new Error('Provider returned a chat response to an embedding request');
    }

    spinner.succeed(`Response received from ${response.model}`);

    const dimension = response.data[0]?.embedding.length ?? 0;
    console.log(`\n  ${chalk.green('✓')} ${response.data.length} embedding(s), dimension ${dimension}`);

    if (options.show) {
      response.data.forEach(item => {
        const preview = item.embedding.slice(0, PREVIEW_LENGTH).map(value => value.toFixed(4));
        console.log(`  [${item.index}] ${preview.join(', ')}${dimension > PREVIEW_LENGTH ? ', ...' : ''}`);
      });
    }

    console.log(chalk.dim(`\nTokens: ${response.usage.prompt_tokens} input`));
  } catch (error) {
    spinner.fail('Embedding failed');
    reportFailure(error);
  }
}
