/**
 * Tests for configuration loading.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import {
  loadConfig,
  getDefaultConfig,
  applyOverrides,
  mergeConfig,
  getConfigPath,
} from '../../../../src/core/config/loader.js';
import { DEFAULT_EXTENSIONS, DEFAULT_EXCLUDE_DIRS } from '../../../../src/core/config/schema.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('getDefaultConfig', () => {
  it('should fill every default', () => {
    const config = getDefaultConfig();

    expect(config.shingle_size).toBe(5);
    expect(config.preview_tokens).toBe(80);
    expect(config.concurrency).toBeUndefined();
    expect(config.diagnostics).toBe(false);
    expect(config.files).toEqual({ extensions: DEFAULT_EXTENSIONS, exclude_dirs: DEFAULT_EXCLUDE_DIRS });
    expect(config.keywords).toEqual({ sets: ['java', 'javascript'], extra: [] });
    expect(config.limits).toEqual({
      max_file_bytes: 1_048_576,
      max_tokens_per_file: 500_000,
      timeout_ms: null,
    });
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codeprint-config-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeProject(name: string, yaml: string): Promise<string> {
    const root = path.join(tmpDir, name);
    await fs.mkdir(path.join(root, '.codeprint'), { recursive: true });
    await fs.writeFile(path.join(root, '.codeprint', 'config.yaml'), yaml, 'utf-8');
    return root;
  }

  it('should return defaults when no config file exists', async () => {
    await expect(loadConfig(tmpDir)).resolves.toEqual(getDefaultConfig());
  });

  it('should merge file values over defaults', async () => {
    const root = await writeProject('partial', [
      'shingle_size: 3',
      'keywords:',
      '  sets: [python]',
      'limits:',
      '  timeout_ms: 2000',
      '',
    ].join('\n'));

    const config = await loadConfig(root);

    expect(config.shingle_size).toBe(3);
    expect(config.keywords).toEqual({ sets: ['python'], extra: [] });
    expect(config.limits.timeout_ms).toBe(2000);
    expect(config.limits.max_file_bytes).toBe(1_048_576);
    expect(config.files.exclude_dirs).toEqual(DEFAULT_EXCLUDE_DIRS);
  });

  it('should accept an empty file', async () => {
    const root = await writeProject('empty', '');

    await expect(loadConfig(root)).resolves.toEqual(getDefaultConfig());
  });

  it('should reject invalid values with C001', async () => {
    const root = await writeProject('invalid', 'shingle_size: 0\n');

    await expect(loadConfig(root)).rejects.toMatchObject({
      name: 'ConfigError',
      code: ErrorCodes.INVALID_CONFIG,
    });
  });

  it('should reject malformed extensions', async () => {
    const root = await writeProject('bad-ext', 'files:\n  extensions: [java]\n');

    await expect(loadConfig(root)).rejects.toThrow('must look like ".ext"');
  });

  it('should load an explicit path relative to the root', async () => {
    const custom = path.join(tmpDir, 'custom.yaml');
    await fs.writeFile(custom, 'preview_tokens: 10\n', 'utf-8');

    const config = await loadConfig(tmpDir, 'custom.yaml');

    expect(config.preview_tokens).toBe(10);
  });

  it('should fail when an explicit path is missing', async () => {
    await expect(loadConfig(tmpDir, 'nope.yaml')).rejects.toThrow(
      `Config file not found: ${path.join(tmpDir, 'nope.yaml')}`
    );
  });
});

describe('applyOverrides', () => {
  it('should override the shingle size', () => {
    const config = applyOverrides(getDefaultConfig(), { shingleSize: 7, diagnostics: true });

    expect(config.shingle_size).toBe(7);
    expect(config.diagnostics).toBe(true);
  });

  it('should keep file values when no override is given', () => {
    const base = mergeConfig({ shingle_size: 4 });

    expect(applyOverrides(base, {}).shingle_size).toBe(4);
  });

  it('should reject a bad shingle size with C002', () => {
    try {
      applyOverrides(getDefaultConfig(), { shingleSize: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ErrorCodes.INVALID_SHINGLE_SIZE);
      }
    }
  });
});

describe('mergeConfig', () => {
  it('should reject out-of-range concurrency', () => {
    expect(() => mergeConfig({ concurrency: 0 })).toThrow(/^Invalid configuration: concurrency:/);
  });
});

describe('getConfigPath', () => {
  it('should point into .codeprint', () => {
    expect(getConfigPath('/work/repo')).toBe(path.resolve('/work/repo', '.codeprint/config.yaml'));
  });
});
