import * as fs from 'fs';
import * as path from 'path';
import { Logger } from './logger';

export class EnvLoader {
  /**
   * Load KEY=VALUE pairs from `<dir>/.env` into process.env.
   * Variables already set in the environment win.
   *
   * @returns the keys that were added
   */
  static load(dir: string = process.cwd()): string[] {
    const envFile = path.resolve(dir, '.env');

    if (!fs.existsSync(envFile)) {
      Logger.debug(`Environment file not found: ${envFile}`);
      return [];
    }

    Logger.debug(`Loading environment from: ${envFile}`);

    const added: string[] = [];
    const lines = fs.readFileSync(envFile, 'utf-8').split('\n');

    lines.forEach(line => {
      const trimmed = line.trim();

      if (!trimmed || trimmed.startsWith('#')) {
        return;
      }

      const match = trimmed.match(/^([^=]+)=(.*)$/);
      if (match) {
        const key = match[1].trim();
        const value = stripQuotes(match[2].trim());

        if (process.env[key] === undefined) {
          process.env[key] = value;
          added.push(key);
        }
      }
    });

    Logger.debug(`Environment loaded: ${added.length} variables from ${envFile}`);
    return added;
  }
}

function stripQuotes(value: string): string {
  const quoted = /^(['"])(.*)\1$/.exec(value);
  return quoted ? quoted[2] : value;
}
