// Tests for Zod schemas

import { describe, it, expect } from 'vitest';
import {
  LinkerOptionsSchema,
  HostingRootSchema,
  safeValidateLinkerOptions
} from './schemas.js';

describe('LinkerOptionsSchema', () => {
  it('should validate a full set of flags', () => {
    const result = LinkerOptionsSchema.safeParse({
      markdown: true,
      permanent: true,
      list: false,
      verbose: false,
      man: false
    });
    expect(result.success).toBe(true);
  });

  it('should reject non-boolean flags', () => {
    expect(safeValidateLinkerOptions({ list: 1 }).success).toBe(false);
  });

  it('should fill missing flags with false', () => {
    const result = safeValidateLinkerOptions({ permanent: true });
    expect(result.success && result.data).toEqual({
      markdown: false,
      permanent: true,
      list: false,
      verbose: false,
      man: false
    });
  });
});

describe('HostingRootSchema', () => {
  it('should accept an owner/repo URL', () => {
    expect(HostingRootSchema.safeParse('https://github.com/openssl/openssl').success).toBe(true);
  });

  it('should reject a URL without a repository', () => {
    expect(HostingRootSchema.safeParse('https://github.com/openssl').success).toBe(false);
  });
});
