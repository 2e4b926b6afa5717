/**
 * Tests for the human-readable report formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { createFormatter, JsonFormatter } from '../../../../src/cli/formatters/index.js';
import { buildReport } from '../../../../src/core/report/report.js';
import type { ComparisonRun, ProcessedFile } from '../../../../src/core/pipeline/types.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

function processed(collection: 'A' | 'B', filePath: string, count: number): ProcessedFile {
  return {
    collection,
    path: filePath,
    fingerprints: new Set(Array.from({ length: count }, (_, i) => `${filePath}-${i}`)),
    normCount: count * 2,
    rawTokenCount: count * 3,
    identifierMap: {},
    preview: [],
    truncated: false,
  };
}

const run: ComparisonRun = {
  rootA: '/repos/a',
  rootB: '/repos/b',
  shingleSize: 5,
  filesA: [processed('A', 'x.java', 3)],
  filesB: [processed('B', 'y.java', 4), processed('B', 'z.java', 1)],
  pairs: [
    { fileA: 'x.java', fileB: 'z.java', jaccard: 0, fingerprintsA: 3, fingerprintsB: 1, tokensA: 6, tokensB: 2 },
    { fileA: 'x.java', fileB: 'y.java', jaccard: 0.4, fingerprintsA: 3, fingerprintsB: 4, tokensA: 6, tokensB: 8 },
  ],
  aggregate: { score: 1 / 3, aToB: 0.4, bToA: 2 / 7, status: 'ok' },
  warnings: [{ collection: 'B', file: 'bin.java', code: ErrorCodes.BINARY_CONTENT, message: 'File looks binary (NUL byte found)' }],
  durationMs: 5,
};

const report = buildReport(run, { now: () => new Date(0) });

describe('HumanFormatter', () => {
  it('should render the summary, ranked pairs, warnings and overall score', () => {
    const output = new HumanFormatter({ colors: false }).formatReport(report);

    expect(output.split('\n')).toEqual([
      'Code Similarity Report',
      '   Repo A: /repos/a (1 files)',
      '   Repo B: /repos/b (2 files)',
      '   Shingle size (k): 5',
      '   Comparisons: 2',
      '',
      'Top 2 most similar file pairs:',
      '   1. x.java',
      '      <--> y.java',
      '      Similarity: 40% (Jaccard: 0.4)',
      '      Fingerprints: A=3, B=4',
      '   2. x.java',
      '      <--> z.java',
      '      Similarity: 0% (Jaccard: 0)',
      '      Fingerprints: A=3, B=1',
      '',
      'WARNINGS (1):',
      '   [S003] B:bin.java File looks binary (NUL byte found)',
      '',
      'Overall repository similarity: 33.33%',
      '   A→B 0.4, B→A 0.2857',
    ]);
  });

  it('should limit the number of pairs', () => {
    const output = new HumanFormatter({ colors: false, top: 1 }).formatReport(report);

    expect(output).toContain('Top 1 most similar file pairs:');
    expect(output).not.toContain('<--> z.java');
  });

  it('should omit the pair section when top is 0', () => {
    const output = new HumanFormatter({ colors: false, top: 0 }).formatReport(report);

    expect(output).not.toContain('most similar');
  });

  it('should list files in verbose mode', () => {
    const output = new HumanFormatter({ colors: false, verbose: true }).formatReport(report);

    expect(output.split('\n')).toContain('   A:x.java tokens=9 normalized=6 fingerprints=3');
  });

  it('should explain an empty collection', () => {
    const empty = buildReport({
      ...run,
      rootA: null,
      filesA: [],
      pairs: [],
      warnings: [],
      aggregate: { score: 0, aToB: 0, bToA: 0, status: 'empty-collection' },
    });

    const lines = new HumanFormatter({ colors: false }).formatReport(empty).split('\n');

    expect(lines[1]).toBe('   Repo A: (in memory) (0 files)');
    expect(lines[lines.length - 1]).toBe('   One collection has no comparable files; score reported as 0.');
  });
});

describe('createFormatter', () => {
  it('should pick the JSON formatter', () => {
    const formatter = createFormatter({ format: 'json' });

    expect(formatter).toBeInstanceOf(JsonFormatter);
    expect(JSON.parse(formatter.formatReport(report))).toEqual(report);
  });

  it('should default to the human formatter', () => {
    expect(createFormatter()).toBeInstanceOf(HumanFormatter);
  });
});
