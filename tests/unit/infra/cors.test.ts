import { describe, expect, it } from 'vitest';

import { isLocalhostOrigin, parseAllowedOrigins } from '@/infra/plugins/cors.js';

describe('parseAllowedOrigins', () => {
  it('splits and trims the list', () => {
    expect([...parseAllowedOrigins(' https://a.example.com, ,https://b.example.com ')]).toEqual([
      'https://a.example.com',
      'https://b.example.com',
    ]);
  });

  it('is empty when unset', () => {
    expect(parseAllowedOrigins(undefined).size).toBe(0);
  });
});

describe('isLocalhostOrigin', () => {
  it.each([
    ['http://localhost:3000', true],
    ['https://127.0.0.1', true],
    ['http://[::1]:8080', true],
    ['http://localhost.example.com', false],
    ['file://localhost', false],
    ['not a url', false],
  ])('%s -> %s', (origin, expected) => {
    expect(isLocalhostOrigin(origin)).toBe(expected);
  });
});
