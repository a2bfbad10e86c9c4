/**
 * TransferValidator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createTransferValidator } from '@/services/transfer.validator.js';

describe('TransferValidator', () => {
  const validator = createTransferValidator({
    policy: { allowedFileTypes: ['.epub', '.PDF'], maxFileSizeMB: 2 },
  });

  describe('isTypeAllowed', () => {
    it('should accept a listed extension regardless of case', () => {
      expect(validator.isTypeAllowed('Novel.EPUB')).toBe(true);
      expect(validator.isTypeAllowed('paper.pdf')).toBe(true);
    });

    it('should reject an unlisted extension', () => {
      expect(validator.isTypeAllowed('archive.rar')).toBe(false);
    });

    it('should reject a name without extension', () => {
      expect(validator.isTypeAllowed('README')).toBe(false);
    });

    it('should use only the last extension', () => {
      expect(validator.isTypeAllowed('book.epub.exe')).toBe(false);
      expect(validator.isTypeAllowed('book.tar.epub')).toBe(true);
    });

    it('should accept everything when the allow-list is empty', () => {
      const open = createTransferValidator({
        policy: { allowedFileTypes: [], maxFileSizeMB: 1 },
      });

      expect(open.isTypeAllowed('anything.xyz')).toBe(true);
      expect(open.isTypeAllowed('no-extension')).toBe(true);
    });
  });

  describe('isSizeAllowed', () => {
    const limit = 2 * 1024 * 1024;

    it('should accept sizes up to and including the limit', () => {
      expect(validator.isSizeAllowed(0)).toBe(true);
      expect(validator.isSizeAllowed(limit)).toBe(true);
    });

    it('should reject one byte over the limit', () => {
      expect(validator.isSizeAllowed(limit + 1)).toBe(false);
    });

    it('should report the limit in bytes', () => {
      expect(validator.maxSizeBytes()).toBe(limit);
    });
  });

  describe('extensionOf', () => {
    it('should return the lower-cased extension with its dot', () => {
      expect(validator.extensionOf('Comic.CBZ')).toBe('.cbz');
      expect(validator.extensionOf('plain')).toBe('');
    });
  });

  describe('policy', () => {
    it('should expose the normalized allow-list', () => {
      expect(validator.policy()).toEqual({
        allowedFileTypes: ['.epub', '.pdf'],
        maxFileSizeMB: 2,
      });
    });
  });
});
