/**
 * @arch fmtkit.test.unit
 */
/**
 * Tests for FormatRunner.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import {
  FormatRunner,
  computeRunFingerprint,
  defaultConcurrency,
} from '../../../../src/core/run/runner.js';
import { FormatterRegistry } from '../../../../src/formatters/formatter-registry.js';
import { CacheStoreSchema } from '../../../../src/core/cache/types.js';
import { computeDigest } from '../../../../src/utils/checksum.js';
import type { RunOptions } from '../../../../src/core/run/types.js';
import { FakeFormatter, SYNTAX_ERROR, makeTempDir, testSettings, writeFiles } from '../../../helpers/fake-formatter.js';

const { readOnlyFiles } = vi.hoisted(() => ({ readOnlyFiles: new Set<string>() }));

// Root may write to any file, so read-only files are simulated
vi.mock('../../../../src/utils/file-system.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/utils/file-system.js')>();
  return {
    ...actual,
    isWritable: async (filePath: string) => (readOnlyFiles.has(filePath) ? false : actual.isWritable(filePath)),
  };
});

describe('FormatRunner', () => {
  let tempDir: string;
  let cachePath: string;
  let formatter: FakeFormatter;
  let registry: FormatterRegistry;

  beforeEach(async () => {
    tempDir = await makeTempDir('runner');
    cachePath = join(tempDir, 'target', 'fmtkit-cache.json');
    formatter = new FakeFormatter('javascript', ['.js']);
    formatter.initialize({}, testSettings());
    registry = new FormatterRegistry();
    registry.register(formatter);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    readOnlyFiles.clear();
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createRunner(options: Partial<RunOptions> = {}): FormatRunner {
    return new FormatRunner(registry, {
      projectRoot: tempDir,
      cachePath,
      lineEnding: 'LF',
      encoding: 'utf8',
      concurrency: 2,
      ...options,
    });
  }

  async function readStore() {
    return CacheStoreSchema.parse(JSON.parse(await fs.readFile(cachePath, 'utf-8')));
  }

  it('should refuse to run without an initialized formatter', async () => {
    const empty = new FormatterRegistry();
    empty.register(new FakeFormatter('java', ['.java']));
    await writeFiles(tempDir, { 'App.java': 'class App {}  ' });
    const runner = new FormatRunner(empty, {
      projectRoot: tempDir,
      cachePath,
      lineEnding: 'LF',
      encoding: 'utf8',
      concurrency: 2,
    });

    await expect(runner.run(['App.java'])).rejects.toMatchObject({
      code: 'C003',
      message: 'You must provide a Java or JavaScript formatter configuration.',
    });
    await expect(fs.access(cachePath)).rejects.toThrow();
    expect(await fs.readFile(join(tempDir, 'App.java'), 'utf-8')).toBe('class App {}  ');
  });

  it('should count every outcome', async () => {
    await writeFiles(tempDir, {
      'a.js': 'x  \n',
      'b.js': 'y\n',
      'c.txt': 'z  ',
      'locked.js': 'q  \n',
    });
    readOnlyFiles.add(join(tempDir, 'locked.js'));

    const report = await createRunner().run(['a.js', 'b.js', 'c.txt', 'missing.js', 'locked.js']);

    expect(report.statistics).toEqual({ successCount: 1, failCount: 1, skippedCount: 2, readOnlyCount: 1 });
    expect(report.results.map((r) => [r.relativePath, r.outcome, r.reason])).toEqual([
      ['a.js', 'success', 'formatted'],
      ['b.js', 'skipped', 'unchanged'],
      ['c.txt', 'skipped', 'unsupported'],
      ['missing.js', 'fail', 'missing'],
      ['locked.js', null, 'read-only'],
    ]);
    expect(report.notStarted).toBe(0);
    expect(report.cachePersisted).toBe(true);
    expect(formatter.calls).toBe(2);
    expect(await fs.readFile(join(tempDir, 'locked.js'), 'utf-8')).toBe('q  \n');
  });

  it('should store the digests of formatted content', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  \n', 'b.js': 'y\n' });

    await createRunner().run(['b.js', 'a.js']);

    const store = await readStore();
    expect(store.files).toEqual({ 'a.js': computeDigest('x\n'), 'b.js': computeDigest('y\n') });
  });

  it('should skip unchanged files on the next run', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  \n', 'b.js': 'y\n' });
    await createRunner().run(['a.js', 'b.js']);
    const callsAfterFirstRun = formatter.calls;

    const report = await createRunner().run(['a.js', 'b.js']);

    expect(report.statistics).toEqual({ successCount: 0, failCount: 0, skippedCount: 2, readOnlyCount: 0 });
    expect(report.results.map((r) => r.reason)).toEqual(['cached', 'cached']);
    expect(formatter.calls).toBe(callsAfterFirstRun);
    expect(await fs.readFile(join(tempDir, 'a.js'), 'utf-8')).toBe('x\n');
  });

  it('should format an edited file again', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  \n' });
    await createRunner().run(['a.js']);
    await writeFiles(tempDir, { 'a.js': 'x2  \n' });

    const report = await createRunner().run(['a.js']);

    expect(report.statistics.successCount).toBe(1);
    expect(await fs.readFile(join(tempDir, 'a.js'), 'utf-8')).toBe('x2\n');
  });

  it('should persist the cache when some files fail', async () => {
    await writeFiles(tempDir, { 'ok.js': 'o  ', 'bad.js': `${SYNTAX_ERROR}  ` });

    const report = await createRunner().run(['ok.js', 'bad.js']);

    expect(report.statistics.successCount).toBe(1);
    expect(report.statistics.failCount).toBe(1);
    expect(report.cachePersisted).toBe(true);
    expect(Object.keys((await readStore()).files)).toEqual(['ok.js']);
  });

  it('should count unreadable files as failures', async () => {
    await fs.writeFile(join(tempDir, 'bin.js'), Buffer.from([0x61, 0xc3, 0x28]));

    const report = await createRunner().run(['bin.js']);

    expect(report.statistics.failCount).toBe(1);
    expect(report.results[0]).toMatchObject({ relativePath: 'bin.js', outcome: 'fail', reason: 'read-error' });
  });

  it('should process each file once', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  ' });
    await fs.symlink(join(tempDir, 'a.js'), join(tempDir, 'link.js'));

    const report = await createRunner().run(['a.js', './a.js', join(tempDir, 'a.js'), 'link.js']);

    expect(report.results).toHaveLength(1);
    expect(formatter.calls).toBe(1);
  });

  it('should format everything again after the configuration changed', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  ' });
    await createRunner().run(['a.js']);

    const report = await createRunner({ lineEnding: 'CRLF' }).run(['a.js']);

    expect(report.statistics.successCount).toBe(1);
    expect(await fs.readFile(join(tempDir, 'a.js'), 'utf-8')).toBe('x\r\n');
  });

  it('should stop scheduling files once aborted', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  ', 'b.js': 'y  ' });
    const controller = new AbortController();
    controller.abort();

    const report = await createRunner({ signal: controller.signal }).run(['a.js', 'b.js']);

    expect(report.results).toEqual([]);
    expect(report.notStarted).toBe(2);
    expect(report.cachePersisted).toBe(true);
    expect(await fs.readFile(join(tempDir, 'a.js'), 'utf-8')).toBe('x  ');
  });

  describe('dry run', () => {
    it('should write neither files nor the cache', async () => {
      await writeFiles(tempDir, { 'a.js': 'x  ' });

      const report = await createRunner({ dryRun: true }).run(['a.js']);

      expect(report.statistics.successCount).toBe(1);
      expect(report.cachePersisted).toBe(false);
      expect(await fs.readFile(join(tempDir, 'a.js'), 'utf-8')).toBe('x  ');
      await expect(fs.access(cachePath)).rejects.toThrow();
    });

    it('should still use the cache of earlier runs', async () => {
      await writeFiles(tempDir, { 'a.js': 'x  ' });
      await createRunner().run(['a.js']);

      const report = await createRunner({ dryRun: true }).run(['a.js']);

      expect(report.results[0].reason).toBe('cached');
    });
  });

  it('should neither read nor write the cache without one', async () => {
    await writeFiles(tempDir, { 'a.js': 'x  ' });
    await createRunner({ noCache: true }).run(['a.js']);

    const report = await createRunner({ noCache: true }).run(['a.js']);

    expect(report.results[0].reason).toBe('unchanged');
    expect(report.cachePersisted).toBe(false);
    await expect(fs.access(cachePath)).rejects.toThrow();
  });

  describe('computeRunFingerprint', () => {
    it('should change with the line-ending policy and encoding', () => {
      const lf = computeRunFingerprint(registry, { lineEnding: 'LF', encoding: 'utf8' });

      expect(computeRunFingerprint(registry, { lineEnding: 'LF', encoding: 'utf8' })).toBe(lf);
      expect(computeRunFingerprint(registry, { lineEnding: 'CRLF', encoding: 'utf8' })).not.toBe(lf);
      expect(computeRunFingerprint(registry, { lineEnding: 'LF', encoding: 'latin1' })).not.toBe(lf);
    });
  });

  it('should default to between 2 and 16 parallel files', () => {
    const concurrency = defaultConcurrency();

    expect(concurrency).toBeGreaterThanOrEqual(2);
    expect(concurrency).toBeLessThanOrEqual(16);
  });
});
