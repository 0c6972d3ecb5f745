/**
 * Chat Command
 *
 * Sends one chat completion request and prints the reply.
 *
 * Usage:
 *   modelbridge chat "What is a vector database?"
 *   modelbridge chat "Summarise this" --system "Answer in one sentence" --model gpt-4o
 *   modelbridge chat "Hello" --provider mock
 */

import chalk from 'chalk';
import ora from 'ora';
import { ModelType, type ChatMessage, type LLMModelKwargs } from '@modelbridge/core';
import {
  DEFAULT_CHAT_MODEL,
  parseNumberOption,
  reportFailure,
  setupClient,
  type ClientCommandOptions,
} from './shared';

export interface ChatCommandOptions extends ClientCommandOptions {
  model?: string;
  system?: string;
  temperature?: string;
  maxTokens?: string;
  async?: boolean;
}

export async function chatCommand(message: string, options: ChatCommandOptions): Promise<void> {
  console.log(chalk.bold('\n💬 modelbridge - Chat\n'));

  const spinner = ora('Loading configuration...').start();

  try {
    const { client, config } = setupClient(options);

    const messages: ChatMessage[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: message });

    const temperature = parseNumberOption('temperature', options.temperature);
    const maxTokens = parseNumberOption('max-tokens', options.maxTokens);
    const modelKwargs: LLMModelKwargs = {
      ...config.llm,
      model: options.model ?? config.llm?.model ?? DEFAULT_CHAT_MODEL,
      ...(temperature !== undefined ? { temperature } : {}),
      ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
    };

    const request = client.buildRequest(messages, modelKwargs, ModelType.LLM);

    spinner.text = `Calling ${modelKwargs.model} (${client.provider})...`;
    const response = options.async
      ? await client.callAsync(request, ModelType.LLM)
      : await client.call(request, ModelType.LLM);
    client.destroy();

    if (!('choices' in response)) {
      throw new Error('Provider returned an embedding response to a chat request');
    }

    spinner.succeed(`Response received from ${response.model}`);

    console.log('');
    console.log(response.choices[0]?.message.content ?? chalk.dim('(empty reply)'));

    if (response.usage) {
      console.log(
        chalk.dim(
          `\nTokens: ${response.usage.prompt_tokens} input, ${response.usage.completion_tokens} output`
        )
      );
    }
  } catch (error) {
    spinner.fail('Chat failed');
    reportFailure(error);
  }
}
