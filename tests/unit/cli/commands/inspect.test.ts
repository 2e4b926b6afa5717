/**
 * Tests for the inspect command.
 */
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { createInspectCommand } from '../../../../src/cli/commands/inspect.js';
import { logger } from '../../../../src/utils/logger.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
}));

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    cyan: (s: string) => s,
  },
}));

describe('inspect command', () => {
  let tmpDir: string;
  let source: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codeprint-inspect-'));
    source = path.join(tmpDir, 'Sample.java');
    await fs.writeFile(source, 'int a = b; // note\n', 'utf-8');
    await fs.writeFile(path.join(tmpDir, 'blob.java'), Buffer.from([0x00, 0x01]));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print JSON statistics', async () => {
    await createInspectCommand().parseAsync([source, '--json'], { from: 'user' });

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      file: source,
      grammar: 'c-family',
      shingle_size_k: 5,
      raw_token_count: 5,
      normalized_token_count: 5,
      fingerprint_count: 1,
      identifier_map: { a: 'ID1', b: 'ID2' },
      normalized_preview: ['int', 'ID1', '=', 'ID2', ';'],
      truncated: false,
    });
  });

  it('should honour --k and --limit', async () => {
    await createInspectCommand().parseAsync([source, '--json', '--k', '2', '--limit', '2'], { from: 'user' });

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toMatchObject({
      shingle_size_k: 2,
      fingerprint_count: 4,
      normalized_preview: ['int', 'ID1'],
    });
  });

  it('should print a readable summary', async () => {
    await createInspectCommand().parseAsync([source], { from: 'user' });

    const lines = consoleLogSpy.mock.calls.map((call) => call[0]);
    expect(lines).toContain(`${source} (c-family)`);
    expect(lines).toContain('   Raw tokens:        5');
    expect(lines).toContain('   Fingerprints:      1 (k=5)');
    expect(lines).toContain('   ID1 ← a');
    expect(lines).toContain('int ID1 = ID2 ;');
  });

  it('should refuse binary files', async () => {
    const blob = path.join(tmpDir, 'blob.java');

    await expect(createInspectCommand().parseAsync([blob], { from: 'user' })).rejects.toThrow('process.exit called');

    expect(logger.error).toHaveBeenCalledWith(`File looks binary: ${blob}`);
  });
});
