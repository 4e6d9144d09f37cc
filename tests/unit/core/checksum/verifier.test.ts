/**
 * Tests for verifying files against their sidecars.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { chmodSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import * as fsPromises from 'node:fs/promises';
import { verifyChecksumFile } from '../../../../src/core/checksum/verifier.js';
import { canEnforcePermissions, makeTempDir, removeTempDir } from '../../../helpers/temp-dir.js';
import { errnoError } from '../../../helpers/errno.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, open: vi.fn(actual.open), stat: vi.fn(actual.stat) };
});

function sha512Hex(content: string): string {
  return createHash('sha512').update(content).digest('hex');
}

describe('verifyChecksumFile', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = makeTempDir('verify');
    filePath = join(tempDir, 'data.txt');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should report NotFound without an error when there is no sidecar', async () => {
    writeFileSync(filePath, 'hello');

    const result = await verifyChecksumFile(filePath);

    expect(result).toEqual({ path: filePath, status: 'NotFound' });
    expect(result.error).toBeUndefined();
  });

  it('should report Match for an uppercase digest', async () => {
    writeFileSync(filePath, 'hello');
    writeFileSync(`${filePath}.sha512`, sha512Hex('hello').toUpperCase());

    const result = await verifyChecksumFile(filePath);

    expect(result.status).toBe('Match');
    expect(result.error).toBeUndefined();
  });

  it('should report Match when the sidecar has surrounding whitespace', async () => {
    writeFileSync(filePath, 'hello');
    writeFileSync(`${filePath}.sha512`, `  ${sha512Hex('hello')}\n`);

    expect((await verifyChecksumFile(filePath)).status).toBe('Match');
  });

  it('should report NotMatch for a different digest', async () => {
    writeFileSync(filePath, 'hello');
    writeFileSync(`${filePath}.sha512`, 'deadbeef');

    const result = await verifyChecksumFile(filePath);

    expect(result.status).toBe('NotMatch');
    expect(result.error).toBeUndefined();
  });

  it('should follow a file through NotFound, Match and NotMatch', async () => {
    writeFileSync(filePath, 'hello');
    expect((await verifyChecksumFile(filePath)).status).toBe('NotFound');

    writeFileSync(`${filePath}.sha512`, sha512Hex('hello').toUpperCase());
    expect((await verifyChecksumFile(filePath)).status).toBe('Match');

    writeFileSync(`${filePath}.sha512`, 'deadbeef');
    expect((await verifyChecksumFile(filePath)).status).toBe('NotMatch');
  });

  it('should report CheckingFailed with an error for a missing data file', async () => {
    const result = await verifyChecksumFile(join(tempDir, 'missing.txt'));

    expect(result.status).toBe('CheckingFailed');
    expect(result.error).toBeInstanceOf(Error);
  });

  it('should report CheckingFailed when the data path is a directory with a sidecar', async () => {
    const dirPath = join(tempDir, 'folder');
    mkdirSync(dirPath);
    writeFileSync(`${dirPath}.sha512`, 'deadbeef');

    const result = await verifyChecksumFile(dirPath);

    expect(result.status).toBe('CheckingFailed');
    expect(result.error).toBeInstanceOf(Error);
  });

  it('should return an absolute path for a relative input', async () => {
    writeFileSync(filePath, 'hello');
    const cwd = process.cwd();
    process.chdir(tempDir);
    try {
      const result = await verifyChecksumFile('data.txt');
      expect(result.path).toBe(join(process.cwd(), 'data.txt'));
    } finally {
      process.chdir(cwd);
    }
  });

  describe.skipIf(!canEnforcePermissions)('permissions', () => {
    it('should report Locked for an unreadable data file', async () => {
      writeFileSync(filePath, 'secret');
      writeFileSync(`${filePath}.sha512`, sha512Hex('secret'));
      chmodSync(filePath, 0o000);
      try {
        const result = await verifyChecksumFile(filePath);

        expect(result.status).toBe('Locked');
        expect(result.error).toBeInstanceOf(Error);
      } finally {
        chmodSync(filePath, 0o600);
      }
    });

    it('should report Locked rather than NotFound when there is no sidecar either', async () => {
      writeFileSync(filePath, 'secret');
      chmodSync(filePath, 0o000);
      try {
        expect((await verifyChecksumFile(filePath)).status).toBe('Locked');
      } finally {
        chmodSync(filePath, 0o600);
      }
    });

    it('should report CheckingFailed for an unreadable sidecar', async () => {
      writeFileSync(filePath, 'hello');
      writeFileSync(`${filePath}.sha512`, sha512Hex('hello'));
      chmodSync(`${filePath}.sha512`, 0o000);
      try {
        const result = await verifyChecksumFile(filePath);

        expect(result.status).toBe('CheckingFailed');
        expect(result.error).toMatchObject({ code: 'EACCES' });
      } finally {
        chmodSync(`${filePath}.sha512`, 0o600);
      }
    });
  });

  describe('filesystem failures', () => {
    it('should report Locked with the open error when the data file is denied', async () => {
      writeFileSync(filePath, 'secret');
      writeFileSync(`${filePath}.sha512`, sha512Hex('secret'));
      const denied = errnoError('EACCES', 'open', filePath);
      vi.mocked(fsPromises.open).mockRejectedValueOnce(denied);

      const result = await verifyChecksumFile(filePath);

      expect(result).toEqual({ path: filePath, status: 'Locked', error: denied });
    });

    it('should report Locked rather than NotFound when a denied file has no sidecar', async () => {
      writeFileSync(filePath, 'secret');
      vi.mocked(fsPromises.open).mockRejectedValueOnce(errnoError('EPERM', 'open', filePath));

      const result = await verifyChecksumFile(filePath);

      expect(result.status).toBe('Locked');
      expect(result.error).toMatchObject({ code: 'EPERM' });
    });

    it('should report CheckingFailed when the sidecar cannot be stat\'ed', async () => {
      writeFileSync(filePath, 'hello');
      writeFileSync(`${filePath}.sha512`, sha512Hex('hello'));
      const denied = errnoError('EACCES', 'stat', `${filePath}.sha512`);
      vi.mocked(fsPromises.stat).mockRejectedValueOnce(denied);

      const result = await verifyChecksumFile(filePath);

      expect(result).toEqual({ path: filePath, status: 'CheckingFailed', error: denied });
    });

    it('should report CheckingFailed for other open errors', async () => {
      writeFileSync(filePath, 'hello');
      vi.mocked(fsPromises.open).mockRejectedValueOnce(errnoError('EIO', 'open', filePath));

      const result = await verifyChecksumFile(filePath);

      expect(result.status).toBe('CheckingFailed');
      expect(result.error).toMatchObject({ code: 'EIO' });
    });
  });
});
