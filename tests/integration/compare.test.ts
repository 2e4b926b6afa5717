/**
 * End-to-end comparison runs over temporary multi-language collections.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { runComparison } from '../../src/core/pipeline/pipeline.js';
import { buildReport, writeReport } from '../../src/core/report/report.js';
import { mergeConfig } from '../../src/core/config/loader.js';
import type { Config } from '../../src/core/config/schema.js';

const MEAN_PY = [
  'def mean(values):',
  '    total = 0',
  '    for v in values:',
  '        total += v',
  '    return total / len(values)',
  '',
].join('\n');

const AVG_PY = [
  '# average helper',
  'def avg(xs):',
  '    s = 0  # running sum',
  '    for x in xs:',
  '        s += x',
  '    return s / len(xs)',
  '',
].join('\n');

const QUEUE_JAVA = [
  'public class Queue<T> {',
  '  private final java.util.ArrayList<T> items = new java.util.ArrayList<>();',
  '  public void push(T item) { items.add(item); }',
  '  public T pop() { return items.remove(0); }',
  '}',
  '',
].join('\n');

const MAIN_GO = [
  'package main',
  '',
  'import "fmt"',
  '',
  'func main() {',
  '\tfmt.Println("hello")',
  '}',
  '',
].join('\n');

describe('compare integration', () => {
  let tempDir: string;
  let repoA: string;
  let repoB: string;
  let config: Config;

  async function write(root: string, relPath: string, content: string): Promise<void> {
    const full = path.join(root, relPath);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  }

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codeprint-e2e-'));
    repoA = path.join(tempDir, 'submission-a');
    repoB = path.join(tempDir, 'submission-b');

    await write(repoA, 'stats.py', MEAN_PY);
    await write(repoA, 'src/Queue.java', QUEUE_JAVA);
    await write(repoA, 'notes.txt', MEAN_PY);

    await write(repoB, 'helpers/avg.py', AVG_PY);
    await write(repoB, 'cmd/main.go', MAIN_GO);
    await write(repoB, 'vendor/Queue.java', QUEUE_JAVA);
    await write(repoB, 'target/Queue.java', QUEUE_JAVA);
    await write(repoB, '.codeprintignore', 'vendor/\n');

    config = mergeConfig({ keywords: { sets: ['python', 'java', 'javascript'], extra: [] } });
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should collect only allowed, non-excluded files', async () => {
    const run = await runComparison(repoA, repoB, config);

    expect(run.filesA.map((f) => f.path)).toEqual(['src/Queue.java', 'stats.py']);
    expect(run.filesB.map((f) => f.path)).toEqual(['cmd/main.go', 'helpers/avg.py']);
    expect(run.pairs).toHaveLength(4);
    expect(run.warnings).toEqual([]);
  });

  it('should rank the renamed copy first with a perfect score', async () => {
    const report = buildReport(await runComparison(repoA, repoB, config));

    expect(report.pairwise_similarities[0]).toMatchObject({
      file_a: 'stats.py',
      file_b: 'helpers/avg.py',
      jaccard: 1,
      similarity_percent: 100,
    });
    expect(report.per_file['A:stats.py'].identifier_map).toEqual({
      mean: 'ID1',
      values: 'ID2',
      total: 'ID3',
      v: 'ID4',
      len: 'ID5',
    });
    expect(report.overall_repo_similarity).toBeGreaterThan(0);
    expect(report.overall_repo_similarity).toBeLessThan(1);
  });

  it('should be symmetric when the collections swap sides', async () => {
    const forward = await runComparison(repoA, repoB, config);
    const backward = await runComparison(repoB, repoA, config);

    expect(backward.aggregate.aToB).toBe(forward.aggregate.bToA);
    expect(backward.aggregate.bToA).toBe(forward.aggregate.aToB);
    expect(backward.aggregate.score).toBeCloseTo(forward.aggregate.score, 12);
  });

  it('should score a collection against itself as 1', async () => {
    const run = await runComparison(repoA, repoA, config);

    expect(run.aggregate).toEqual({ score: 1, aToB: 1, bToA: 1, status: 'ok' });
  });

  it('should be stable across runs and respect the shingle size', async () => {
    const first = await runComparison(repoA, repoB, config);
    const second = await runComparison(repoA, repoB, config);
    const coarse = await runComparison(repoA, repoB, mergeConfig({ ...config, shingle_size: 3 }));

    expect(second.aggregate).toEqual(first.aggregate);
    expect(coarse.shingleSize).toBe(3);
    expect(coarse.filesA[1].fingerprints.size).toBeGreaterThan(first.filesA[1].fingerprints.size);
  });

  it('should write a report that reads back unchanged', async () => {
    const report = buildReport(await runComparison(repoA, repoB, config), { now: () => new Date(0) });
    const out = path.join(tempDir, 'reports', 'result.json');

    await writeReport(out, report);

    expect(JSON.parse(await fs.readFile(out, 'utf-8'))).toEqual(report);
  });
});
