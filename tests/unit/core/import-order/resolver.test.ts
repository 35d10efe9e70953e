/**
 * @arch fmtkit.test.unit
 */
/**
 * Tests for import order resolution.
 */
import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import {
  resolveImportOrder,
  parseImportOrder,
  DEFAULT_IMPORT_ORDER,
} from '../../../../src/core/import-order/resolver.js';
import { ConfigError } from '../../../../src/utils/errors.js';
import { makeTempDir, writeFiles } from '../../../helpers/fake-formatter.js';

describe('import order resolver', () => {
  describe('parseImportOrder', () => {
    it('should order prefixes by index', () => {
      expect(parseImportOrder('#Organize Import Order\n2=com\n0=java\n1=org\n')).toEqual(['java', 'org', 'com']);
    });

    it('should treat a missing prefix as the catch-all group', () => {
      expect(parseImportOrder('0=java\n1=\n2=com')).toEqual(['java', '', 'com']);
      expect(parseImportOrder('0=java\n1\n')).toEqual(['java', '']);
    });

    it('should keep the last prefix for a repeated index', () => {
      expect(parseImportOrder('0=java\n0=javax\n')).toEqual(['javax']);
    });

    it('should accept CRLF and surrounding spaces', () => {
      expect(parseImportOrder(' 1 = org \r\n0=java\r\n')).toEqual(['java', 'org']);
    });

    it('should reject a non-numeric index', () => {
      expect(() => parseImportOrder('0=java\nx=org', 'team.importorder')).toThrow(ConfigError);
      expect(() => parseImportOrder('0=java\nx=org', 'team.importorder')).toThrow(
        "Invalid import order entry in [team.importorder] at line 2: 'x=org'"
      );
    });

    it('should reject an index beyond the safe integer range', () => {
      expect(() => parseImportOrder('9007199254740993=a\n9007199254740992=b', 'big.importorder')).toThrow(
        "Invalid import order entry in [big.importorder] at line 1: '9007199254740993=a'"
      );
    });
  });

  describe('resolveImportOrder', () => {
    let tempDir = '';

    afterEach(async () => {
      if (tempDir) await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should use the built-in order without a file', async () => {
      expect(await resolveImportOrder(null, '/project')).toEqual(['java', 'javax', 'org', 'com']);
      expect(await resolveImportOrder('  ', '/project')).toEqual([...DEFAULT_IMPORT_ORDER]);
    });

    it('should read an order file relative to the project root', async () => {
      tempDir = await makeTempDir('order');
      await writeFiles(tempDir, { 'config/team.importorder': '0=com.acme\n1=java\n2=\n' });

      expect(await resolveImportOrder('config/team.importorder', tempDir)).toEqual(['com.acme', 'java', '']);
    });

    it('should fail for a missing file', async () => {
      tempDir = await makeTempDir('order');

      await expect(resolveImportOrder('missing.importorder', tempDir)).rejects.toMatchObject({
        code: 'C001',
        message: 'Cannot find config file [missing.importorder]',
      });
    });
  });
});
