import { describe, it, expect } from 'vitest';

import { generateUUID } from '../uuid';

describe('generateUUID', () => {
  it('should produce RFC 4122 version 4 identifiers', () => {
    expect(generateUUID()).toMatch(/^[\da-f]{8}-[\da-f]{4}-4[\da-f]{3}-[89ab][\da-f]{3}-[\da-f]{12}$/);
  });

  it('should not repeat itself', () => {
    const ids = new Set(Array.from({ length: 500 }, () => generateUUID()));
    expect(ids.size).toBe(500);
  });
});
