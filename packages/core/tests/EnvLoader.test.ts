import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EnvLoader } from '../src/utils/env-loader';

describe('EnvLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'modelbridge-env-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    delete process.env.MODELBRIDGE_TEST_PLAIN;
    delete process.env.MODELBRIDGE_TEST_QUOTED;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns nothing when there is no .env file', () => {
    expect(EnvLoader.load(dir)).toEqual([]);
  });

  it('loads variables, skipping comments and stripping quotes', () => {
    fs.writeFileSync(
      path.join(dir, '.env'),
      ['# comment', '', 'MODELBRIDGE_TEST_PLAIN=plain', 'MODELBRIDGE_TEST_QUOTED="quoted value"'].join('\n')
    );

    expect(EnvLoader.load(dir)).toEqual(['MODELBRIDGE_TEST_PLAIN', 'MODELBRIDGE_TEST_QUOTED']);
    expect(process.env.MODELBRIDGE_TEST_PLAIN).toBe('plain');
    expect(process.env.MODELBRIDGE_TEST_QUOTED).toBe('quoted value');
  });

  it('never overrides variables already set', () => {
    vi.stubEnv('MODELBRIDGE_TEST_PLAIN', 'from-shell');
    fs.writeFileSync(path.join(dir, '.env'), 'MODELBRIDGE_TEST_PLAIN=from-file\n');

    expect(EnvLoader.load(dir)).toEqual([]);
    expect(process.env.MODELBRIDGE_TEST_PLAIN).toBe('from-shell');
  });
});
