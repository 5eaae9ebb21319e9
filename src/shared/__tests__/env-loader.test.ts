/**
 * Environment loader tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { findProjectRoot, getEnv, getEnvBoolean, getEnvNumber, getEnvOrThrow, loadEnv } from '../env-loader';
import { ConfigurationError } from '../errors';

const VARS = ['REPO_INSIGHT_TEST_A', 'REPO_INSIGHT_TEST_B', 'REPO_INSIGHT_TEST_N', 'REPO_INSIGHT_TEST_FLAG'];

describe('env-loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'repo-insight-env-'));
    for (const name of VARS) delete process.env[name];
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    for (const name of VARS) delete process.env[name];
  });

  describe('findProjectRoot', () => {
    it('should walk up to the directory holding .env', () => {
      const nested = path.join(tempDir, 'a', 'b');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, '.env'), '');

      expect(findProjectRoot(nested)).toBe(path.resolve(tempDir));
    });

    it('should stop at a package.json', () => {
      const pkgDir = path.join(tempDir, 'pkg');
      const nested = path.join(pkgDir, 'src');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(pkgDir, 'package.json'), '{}');

      expect(findProjectRoot(nested)).toBe(path.resolve(pkgDir));
    });
  });

  describe('loadEnv', () => {
    it('should load variables from the resolved .env file', () => {
      fs.writeFileSync(path.join(tempDir, '.env'), 'REPO_INSIGHT_TEST_A=from-file\n');

      const loaded = loadEnv({ startDir: tempDir });

      expect(loaded).toBe(path.join(path.resolve(tempDir), '.env'));
      expect(process.env.REPO_INSIGHT_TEST_A).toBe('from-file');
    });

    it('should not override values already in the environment', () => {
      fs.writeFileSync(path.join(tempDir, '.env'), 'REPO_INSIGHT_TEST_A=from-file\n');
      process.env.REPO_INSIGHT_TEST_A = 'from-process';

      loadEnv({ envPath: path.join(tempDir, '.env') });

      expect(process.env.REPO_INSIGHT_TEST_A).toBe('from-process');
    });

    it('should apply overrides', () => {
      fs.writeFileSync(path.join(tempDir, '.env'), 'REPO_INSIGHT_TEST_A=from-file\n');

      loadEnv({ envPath: path.join(tempDir, '.env'), overrides: { REPO_INSIGHT_TEST_B: 'override' } });

      expect(process.env.REPO_INSIGHT_TEST_B).toBe('override');
    });

    it('should return null when the file is missing', () => {
      expect(loadEnv({ envPath: path.join(tempDir, 'missing.env') })).toBeNull();
    });

    it('should throw when a required file is missing', () => {
      expect(() => loadEnv({ envPath: path.join(tempDir, 'missing.env'), required: true })).toThrow(ConfigurationError);
    });
  });

  describe('getters', () => {
    it('should trim values and treat blanks as unset', () => {
      process.env.REPO_INSIGHT_TEST_A = '  value\r\n';
      process.env.REPO_INSIGHT_TEST_B = '   ';

      expect(getEnv('REPO_INSIGHT_TEST_A')).toBe('value');
      expect(getEnv('REPO_INSIGHT_TEST_B', 'fallback')).toBe('fallback');
    });

    it('should throw ConfigurationError for a missing required variable', () => {
      expect(() => getEnvOrThrow('REPO_INSIGHT_TEST_A')).toThrow('Required environment variable REPO_INSIGHT_TEST_A is not set');
      expect(getEnvOrThrow('REPO_INSIGHT_TEST_A', 'default')).toBe('default');
    });

    it('should parse numbers and reject garbage', () => {
      expect(getEnvNumber('REPO_INSIGHT_TEST_N', 5)).toBe(5);
      process.env.REPO_INSIGHT_TEST_N = '0.4';
      expect(getEnvNumber('REPO_INSIGHT_TEST_N', 5)).toBe(0.4);
      process.env.REPO_INSIGHT_TEST_N = 'fast';
      expect(() => getEnvNumber('REPO_INSIGHT_TEST_N', 5)).toThrow(ConfigurationError);
    });

    it('should parse booleans', () => {
      expect(getEnvBoolean('REPO_INSIGHT_TEST_FLAG')).toBe(false);
      process.env.REPO_INSIGHT_TEST_FLAG = 'Yes';
      expect(getEnvBoolean('REPO_INSIGHT_TEST_FLAG')).toBe(true);
      process.env.REPO_INSIGHT_TEST_FLAG = 'off';
      expect(getEnvBoolean('REPO_INSIGHT_TEST_FLAG', true)).toBe(false);
    });
  });
});
