/**
 * Check Command
 *
 * Validates the environment and, when given, a YAML client configuration file.
 *
 * Usage:
 *   modelbridge check
 *   modelbridge check --config modelbridge.yaml
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import {
  validateClientConfigFile,
  validateClientEnv,
  type ValidationError,
} from '@modelbridge/core';

export interface CheckCommandOptions {
  config?: string;
}

interface CheckSummary {
  errors: string[];
  warnings: string[];
}

export async function checkCommand(
  options: CheckCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  console.log(chalk.bold('\n✅ modelbridge - Check Configuration\n'));

  const summary: CheckSummary = { errors: [], warnings: [] };

  checkEnvironment(env, summary);
  if (options.config) {
    checkConfigFile(options.config, summary);
  } else {
    console.log(chalk.dim('  - No config file given (optional)'));
  }

  printResults(summary);
}

function collect(source: string, errors: ValidationError[], summary: CheckSummary): void {
  errors.forEach(err => summary.errors.push(`${source} [${err.path}]: ${err.message}`));
}

function checkEnvironment(env: NodeJS.ProcessEnv, summary: CheckSummary): void {
  const result = validateClientEnv(env);

  if (!result.valid) {
    console.log(chalk.red('  ✗ environment - VALIDATION FAILED'));
    collect('environment', result.errors, summary);
    return;
  }

  const provider = result.data.LLM_PROVIDER ?? 'openai';
  console.log(chalk.green(`  ✓ environment (provider: ${provider})`));

  const rawProvider = env.LLM_PROVIDER?.trim();
  if (rawProvider && result.data.LLM_PROVIDER === undefined) {
    summary.warnings.push(`Invalid LLM_PROVIDER="${rawProvider}", using default "openai"`);
  }

  if (provider === 'mock') {
    summary.warnings.push('LLM_PROVIDER=mock: no requests will reach OpenAI');
  }
}

function checkConfigFile(configFile: string, summary: CheckSummary): void {
  const configPath = path.resolve(configFile);

  if (!fs.existsSync(configPath)) {
    summary.errors.push(`Config file not found: ${configFile}`);
    console.log(chalk.red(`  ✗ ${configFile} - NOT FOUND`));
    return;
  }

  const result = validateClientConfigFile(configPath);

  if (!result.valid) {
    console.log(chalk.red(`  ✗ ${configFile} - VALIDATION FAILED`));
    collect(configFile, result.errors, summary);
    return;
  }

  const data = result.data;
  const sections = (['embedder', 'llm', 'retry'] as const).filter(key => data[key] !== undefined);
  console.log(
    chalk.green(`  ✓ ${configFile} (sections: ${sections.length > 0 ? sections.join(', ') : 'none'})`)
  );
}

function printResults(summary: CheckSummary): void {
  console.log('\n' + '='.repeat(60));
  console.log('CHECK RESULTS');
  console.log('='.repeat(60) + '\n');

  if (summary.warnings.length > 0) {
    console.log(chalk.yellow(`⚠  Warnings (${summary.warnings.length}):`));
    summary.warnings.forEach(w => console.log(`   ${w}`));
    console.log('');
  }

  if (summary.errors.length > 0) {
    console.log(chalk.red(`✗  Errors (${summary.errors.length}):`));
    summary.errors.forEach(e => console.log(`   ${e}`));
    console.log(chalk.red('\n✗ CHECK FAILED\n'));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.green('✓ CHECK PASSED\n'));
}
