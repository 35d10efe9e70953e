/**
 * @arch fmtkit.test.unit
 */
/**
 * Tests for file system utilities.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import { promises, constants } from 'node:fs';
import { join } from 'node:path';
import {
  readTextFile,
  writeFileAtomic,
  fileExists,
  isWritable,
  isDirectory,
  canonicalPath,
  globFiles,
  toPosixRelative,
} from '../../../src/utils/file-system.js';
import { makeTempDir, writeFiles } from '../../helpers/fake-formatter.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('fs');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('readTextFile', () => {
    it('should decode utf-8', async () => {
      await writeFiles(tempDir, { 'a.txt': 'héllo' });

      expect(await readTextFile(join(tempDir, 'a.txt'), 'utf8')).toBe('héllo');
    });

    it('should reject invalid utf-8 bytes', async () => {
      await fs.writeFile(join(tempDir, 'bad.txt'), Buffer.from([0x61, 0xc3, 0x28]));

      await expect(readTextFile(join(tempDir, 'bad.txt'), 'utf8')).rejects.toThrow();
    });

    it('should decode single-byte encodings', async () => {
      await fs.writeFile(join(tempDir, 'latin.txt'), Buffer.from([0x63, 0x61, 0x66, 0xe9]));

      expect(await readTextFile(join(tempDir, 'latin.txt'), 'latin1')).toBe('café');
    });
  });

  describe('writeFileAtomic', () => {
    it('should replace content without leaving temporary files', async () => {
      const target = join(tempDir, 'A.java');
      await writeFiles(tempDir, { 'A.java': 'old' });

      await writeFileAtomic(target, 'new');

      expect(await fs.readFile(target, 'utf-8')).toBe('new');
      expect(await fs.readdir(tempDir)).toEqual(['A.java']);
    });

    it('should keep the file mode', async () => {
      const target = join(tempDir, 'run.js');
      await writeFiles(tempDir, { 'run.js': 'old' });
      await fs.chmod(target, 0o600);

      await writeFileAtomic(target, 'new');

      expect((await fs.stat(target)).mode & 0o777).toBe(0o600);
    });

    it('should encode with the given encoding', async () => {
      const target = join(tempDir, 'latin.txt');

      await writeFileAtomic(target, 'é', 'latin1');

      expect([...(await fs.readFile(target))]).toEqual([0xe9]);
    });

    it('should create parent directories', async () => {
      const target = join(tempDir, 'target', 'cache.json');

      await writeFileAtomic(target, '{}');

      expect(await fileExists(target)).toBe(true);
    });
  });

  describe('checks', () => {
    it('should detect files and directories', async () => {
      await writeFiles(tempDir, { 'src/A.java': '' });

      expect(await fileExists(join(tempDir, 'src/A.java'))).toBe(true);
      expect(await fileExists(join(tempDir, 'src/B.java'))).toBe(false);
      expect(await isDirectory(join(tempDir, 'src'))).toBe(true);
      expect(await isDirectory(join(tempDir, 'src/A.java'))).toBe(false);
    });

    it('should report writable files', async () => {
      await writeFiles(tempDir, { 'A.java': '' });

      expect(await isWritable(join(tempDir, 'A.java'))).toBe(true);
    });

    it('should report read-only files', async () => {
      await writeFiles(tempDir, { 'A.java': '' });
      const access = vi
        .spyOn(promises, 'access')
        .mockRejectedValueOnce(Object.assign(new Error('permission denied'), { code: 'EACCES' }));

      expect(await isWritable(join(tempDir, 'A.java'))).toBe(false);
      expect(access).toHaveBeenCalledWith(join(tempDir, 'A.java'), constants.W_OK);
      access.mockRestore();
    });
  });

  describe('canonicalPath', () => {
    it('should resolve symlinks', async () => {
      await writeFiles(tempDir, { 'real.js': '' });
      await fs.symlink(join(tempDir, 'real.js'), join(tempDir, 'link.js'));

      expect(await canonicalPath(join(tempDir, 'link.js'))).toBe(join(tempDir, 'real.js'));
    });

    it('should keep missing paths', async () => {
      expect(await canonicalPath(join(tempDir, 'gone', '..', 'x.js'))).toBe(join(tempDir, 'x.js'));
    });
  });

  describe('globFiles', () => {
    it('should match case-insensitively when asked', async () => {
      await writeFiles(tempDir, { 'A.JAVA': '', 'b.java': '', 'c.js': '' });

      const files = await globFiles('**/*.java', { cwd: tempDir, absolute: false, caseSensitive: false });

      expect(files.sort()).toEqual(['A.JAVA', 'b.java']);
    });
  });

  it('should build posix relative paths', () => {
    expect(toPosixRelative('/project', '/project/src/main/A.java')).toBe('src/main/A.java');
  });
});
