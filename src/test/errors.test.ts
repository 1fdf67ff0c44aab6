import { describe, expect, test } from 'vitest';
import {
  ApiError,
  ConfigurationError,
  EXIT_CODES,
  FileSystemError,
  getExitCodeForError,
  isMd2cfError,
  NetworkError,
  ParseError,
  VersionConflictError,
} from '../lib/errors.js';

describe('Error types', () => {
  describe('ConfigurationError', () => {
    test('has correct _tag', () => {
      const error = new ConfigurationError('Missing space');
      expect(error._tag).toBe('ConfigurationError');
      expect(error.message).toBe('Missing space');
      expect(error.name).toBe('ConfigurationError');
    });
  });

  describe('FileSystemError', () => {
    test('has correct _tag', () => {
      const error = new FileSystemError('File not found');
      expect(error._tag).toBe('FileSystemError');
      expect(error.message).toBe('File not found');
    });
  });

  describe('ParseError', () => {
    test('has correct _tag', () => {
      const error = new ParseError('Invalid front-matter');
      expect(error._tag).toBe('ParseError');
    });
  });

  describe('ApiError', () => {
    test('keeps status code and body', () => {
      const error = new ApiError('Not found', 404, '{"message":"gone"}');
      expect(error._tag).toBe('ApiError');
      expect(error.statusCode).toBe(404);
      expect(error.body).toBe('{"message":"gone"}');
    });

    test('defaults body to empty string', () => {
      expect(new ApiError('Bad gateway', 502).body).toBe('');
    });
  });

  describe('VersionConflictError', () => {
    test('is an ApiError with status 409', () => {
      const error = new VersionConflictError('42', 3);
      expect(error).toBeInstanceOf(ApiError);
      expect(error._tag).toBe('VersionConflictError');
      expect(error.statusCode).toBe(409);
      expect(error.pageId).toBe('42');
      expect(error.localVersion).toBe(3);
      expect(error.message).toBe('Version conflict on page 42: version 3 is stale');
    });
  });

  describe('NetworkError', () => {
    test('has correct _tag', () => {
      expect(new NetworkError('ECONNREFUSED')._tag).toBe('NetworkError');
    });
  });
});

describe('getExitCodeForError', () => {
  test('maps configuration errors to CONFIG_ERROR', () => {
    expect(getExitCodeForError(new ConfigurationError('x'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(EXIT_CODES.CONFIG_ERROR).toBe(2);
  });

  test('maps everything else to GENERAL_ERROR', () => {
    expect(getExitCodeForError(new ApiError('x', 500))).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(getExitCodeForError(new NetworkError('x'))).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(getExitCodeForError(new ParseError('x'))).toBe(EXIT_CODES.GENERAL_ERROR);
  });
});

describe('isMd2cfError', () => {
  test('recognises tagged errors', () => {
    expect(isMd2cfError(new VersionConflictError('1', 1))).toBe(true);
    expect(isMd2cfError(new FileSystemError('x'))).toBe(true);
  });

  test('rejects other values', () => {
    expect(isMd2cfError(new Error('plain'))).toBe(false);
    expect(isMd2cfError('ConfigurationError')).toBe(false);
  });
});
