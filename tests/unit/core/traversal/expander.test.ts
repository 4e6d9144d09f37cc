/**
 * Tests for expanding raw inputs into groups and candidates.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  collectCandidates,
  collectGroupCandidates,
  expand,
  expandInputs,
  STDIN_LABEL,
} from '../../../../src/core/traversal/expander.js';
import { TraversalError } from '../../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../../helpers/temp-dir.js';

describe('traversal expander', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('expand');
    writeFileSync(join(tempDir, 'a.txt'), 'a');
    writeFileSync(join(tempDir, 'a.txt.sha512'), 'abc');
    writeFileSync(join(tempDir, 'b.txt'), 'b');
    writeFileSync(join(tempDir, 'notes.md'), 'notes');
    mkdirSync(join(tempDir, 'sub'));
    writeFileSync(join(tempDir, 'sub', 'c.txt'), 'c');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  describe('expandInputs', () => {
    it('should keep a literal path as its own group', async () => {
      const { groups, errors } = await expandInputs([join(tempDir, 'a.txt')]);

      expect(groups).toEqual([
        { label: join(tempDir, 'a.txt'), source: 'path', paths: [join(tempDir, 'a.txt')] },
      ]);
      expect(errors).toEqual([]);
    });

    it('should expand a glob into one group without sidecars', async () => {
      const { groups } = await expandInputs(['*.txt*'], { cwd: tempDir });

      expect(groups).toEqual([
        {
          label: '*.txt*',
          source: 'glob',
          paths: [join(tempDir, 'a.txt'), join(tempDir, 'b.txt')],
        },
      ]);
    });

    it('should include matched directories', async () => {
      const { groups } = await expandInputs(['s*'], { cwd: tempDir });

      expect(groups[0].paths).toEqual([join(tempDir, 'sub')]);
    });

    it('should report a glob with no matches and keep going', async () => {
      const { groups, errors } = await expandInputs(['*.pdf', join(tempDir, 'b.txt')], { cwd: tempDir });

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TraversalError);
      expect(errors[0].message).toBe('no matches for "*.pdf"');
      expect(groups.map((group) => group.label)).toEqual([join(tempDir, 'b.txt')]);
    });

    it('should resolve relative literals and stdin paths against cwd', async () => {
      const { groups } = await expandInputs(['b.txt'], { cwd: tempDir, stdinPaths: ['sub/c.txt'] });

      expect(groups).toEqual([
        { label: 'b.txt', source: 'path', paths: [join(tempDir, 'b.txt')] },
        { label: STDIN_LABEL, source: 'stdin', paths: [join(tempDir, 'sub', 'c.txt')] },
      ]);
    });

    it('should append stdin paths as a final group', async () => {
      const { groups } = await expandInputs([join(tempDir, 'a.txt')], {
        stdinPaths: [join(tempDir, 'b.txt')],
      });

      expect(groups[1]).toEqual({ label: STDIN_LABEL, source: 'stdin', paths: [join(tempDir, 'b.txt')] });
    });

    it('should skip an empty stdin list', async () => {
      const { groups } = await expandInputs([], { stdinPaths: [] });

      expect(groups).toEqual([]);
    });
  });

  describe('collectCandidates', () => {
    it('should return a regular file as an absolute candidate', async () => {
      const cwd = process.cwd();
      process.chdir(tempDir);
      try {
        const { candidates } = await collectCandidates('b.txt');
        expect(candidates).toEqual([join(process.cwd(), 'b.txt')]);
      } finally {
        process.chdir(cwd);
      }
    });

    it('should walk a directory', async () => {
      const { candidates, errors } = await collectCandidates(tempDir);

      expect(candidates).toEqual([
        join(tempDir, 'a.txt'),
        join(tempDir, 'b.txt'),
        join(tempDir, 'notes.md'),
        join(tempDir, 'sub', 'c.txt'),
      ]);
      expect(errors).toEqual([]);
    });

    it('should reject a sidecar passed directly', async () => {
      const sidecar = join(tempDir, 'a.txt.sha512');

      const { candidates, errors } = await collectCandidates(sidecar);

      expect(candidates).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe('T003');
      expect(errors[0].message).toBe(`${sidecar} is a checksum file.`);
    });

    it('should report a missing path', async () => {
      const { candidates, errors } = await collectCandidates(join(tempDir, 'missing.txt'));

      expect(candidates).toEqual([]);
      expect(errors[0].code).toBe('T002');
      expect(errors[0].details).toEqual({ path: join(tempDir, 'missing.txt') });
    });
  });

  describe('collectGroupCandidates', () => {
    it('should concatenate candidates and errors of every path', async () => {
      const { candidates, errors } = await collectGroupCandidates({
        label: 'mixed',
        source: 'stdin',
        paths: [join(tempDir, 'sub'), join(tempDir, 'missing.txt'), join(tempDir, 'b.txt')],
      });

      expect(candidates).toEqual([join(tempDir, 'sub', 'c.txt'), join(tempDir, 'b.txt')]);
      expect(errors).toHaveLength(1);
    });
  });

  describe('expand', () => {
    it('should flatten every input into one ordered list', async () => {
      const { candidates, errors } = await expand(
        [join(tempDir, 'sub'), '*.md', '*.none', join(tempDir, 'a.txt.sha512')],
        { cwd: tempDir, stdinPaths: [join(tempDir, 'b.txt')] }
      );

      expect(candidates).toEqual([
        join(tempDir, 'sub', 'c.txt'),
        join(tempDir, 'notes.md'),
        join(tempDir, 'b.txt'),
      ]);
      expect(errors.map((error) => error.code)).toEqual(['T001', 'T003']);
    });
  });
});
