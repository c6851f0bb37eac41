import { parseIntSafe, parseOrigins } from '../config';

describe('parseIntSafe', () => {
  it('falls back to the default when unset', () => {
    expect(parseIntSafe(undefined, 3001, 'PORT')).toBe(3001);
    expect(parseIntSafe('', 3001, 'PORT')).toBe(3001);
  });

  it('parses integers', () => {
    expect(parseIntSafe('8080', 3001, 'PORT')).toBe(8080);
  });

  it('throws on non-numeric values', () => {
    expect(() => parseIntSafe('abc', 3001, 'PORT')).toThrow(
      'Invalid PORT: "abc" is not a valid integer',
    );
  });
});

describe('parseOrigins', () => {
  it('allows any origin by default', () => {
    expect(parseOrigins(undefined)).toBe('*');
    expect(parseOrigins(' * ')).toBe('*');
  });

  it('splits a comma separated list', () => {
    expect(parseOrigins('http://localhost:3000, https://example.test,')).toEqual([
      'http://localhost:3000',
      'https://example.test',
    ]);
  });
});
