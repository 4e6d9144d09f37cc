/**
 * Tests for the JSON report formatter.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { ErrorCodes, TraversalError } from '../../../../src/utils/errors.js';
import type { CreationOutcome, VerificationOutcome } from '../../../../src/core/checksum/types.js';

describe('JsonFormatter', () => {
  describe('check', () => {
    const formatter = new JsonFormatter('check');

    it('should count verification statuses', () => {
      const results: VerificationOutcome[] = [
        { path: '/a', status: 'Match' },
        { path: '/b', status: 'Match' },
        { path: '/c', status: 'NotMatch' },
        { path: '/d', status: 'CheckingFailed', error: new Error('EIO: i/o error') },
      ];

      expect(formatter.formatGroup('./data', results, 'path')).toEqual({
        label: './data',
        source: 'path',
        results: [
          { path: '/a', status: 'Match' },
          { path: '/b', status: 'Match' },
          { path: '/c', status: 'NotMatch' },
          { path: '/d', status: 'CheckingFailed', error: 'EIO: i/o error' },
        ],
        summary: { total: 4, match: 2, notMatch: 1, notFound: 0, locked: 0, checkingFailed: 1 },
      });
    });

    it('should leave out an unknown source', () => {
      expect(formatter.formatGroup('x', [])).not.toHaveProperty('source');
    });

    it('should serialize a full report', () => {
      const group = formatter.formatGroup('/a', [{ path: '/a', status: 'NotFound' }], 'path');
      const errors = [new TraversalError(ErrorCodes.PATH_NOT_FOUND, 'missing', { path: '/m' })];

      const report = JSON.parse(formatter.formatReport('v0.1.0', [group], errors));

      expect(report).toEqual({
        command: 'check',
        version: 'v0.1.0',
        interrupted: false,
        groups: [group],
        errors: [
          { name: 'TraversalError', code: 'T002', message: 'missing', details: { path: '/m' } },
        ],
      });
    });

    it('should mark interrupted reports', () => {
      const report = JSON.parse(formatter.formatReport('v0.1.0', [], [], true));

      expect(report.interrupted).toBe(true);
    });
  });

  describe('create', () => {
    const formatter = new JsonFormatter('create');

    it('should count creation statuses', () => {
      const results: CreationOutcome[] = [
        { path: '/a', status: 'Created' },
        { path: '/b', status: 'Existing' },
        { path: '/c', status: 'LockedCreation', error: new Error('EACCES') },
      ];

      expect(formatter.formatGroup('*.bin', results, 'glob').summary).toEqual({
        total: 3,
        created: 1,
        existing: 1,
        locked: 1,
        failed: 0,
      });
    });
  });
});
