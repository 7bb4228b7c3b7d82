import { describe, it, expect } from 'vitest';
import { DecodeError, EncodeError, OptionsError } from '@csvjson/core';
import { statusFor } from '../../src/http/respond.js';
import { UploadError } from '../../src/http/upload.js';

describe('statusFor', () => {
  it('should treat input problems as client errors', () => {
    expect(statusFor(new OptionsError('delimiter must be a single character (got "ab")', 'delimiter'))).toBe(400);
    expect(statusFor(new DecodeError('ENCODING', 'input is not valid UTF-8'))).toBe(400);
    expect(statusFor(new DecodeError('MALFORMED', 'unterminated quoted field'))).toBe(400);
    expect(statusFor(new UploadError('missing multipart field "file"'))).toBe(400);
  });

  it('should treat everything else as a server error', () => {
    expect(statusFor(new EncodeError('element 0 has no JSON representation', 0))).toBe(500);
    expect(statusFor(new Error('socket hang up'))).toBe(500);
    expect(statusFor('boom')).toBe(500);
  });
});
