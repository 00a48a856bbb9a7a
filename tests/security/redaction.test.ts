import { describe, it, expect } from 'vitest';
import { redact } from '../../src/security/redaction.js';

describe('redact', () => {
  // Literal secrets
  it('replaces known secrets wherever they appear', () => {
    expect(redact('sent test-secret to test-secret', ['test-secret'])).toBe('sent <REDACTED> to <REDACTED>');
  });

  it('ignores known secrets shorter than four characters', () => {
    expect(redact('abc', ['abc'])).toBe('abc');
  });

  // Token-level
  it('redacts bearer tokens', () => {
    expect(redact('Authorization: Bearer test-token-value')).toBe('Authorization: Bearer <REDACTED>');
  });

  it('redacts sk- style keys', () => {
    expect(redact(`key sk-${'x'.repeat(24)}`)).toBe('key sk-***REDACTED***');
  });

  it('redacts JWT-shaped values', () => {
    expect(redact('token eyJtest.payload.signature')).toBe('token <REDACTED_JWT>');
  });

  // KV-level
  it('redacts the secret field of a JSON submission payload', () => {
    expect(redact('{"email":"student@example.com","secret":"placeholder"}'))
      .toBe('{"email":"student@example.com","secret": "<REDACTED>"}');
  });

  it('redacts env-style secret assignments', () => {
    expect(redact('QCR_SECRET=placeholder-value')).toBe('QCR_SECRET=<REDACTED>');
    expect(redact('PASSWORD=placeholder')).toBe('PASSWORD=<REDACTED>');
  });

  it('leaves already-redacted values alone', () => {
    expect(redact('PASSWORD=<REDACTED>')).toBe('PASSWORD=<REDACTED>');
  });

  // False-positive avoidance
  it('does NOT redact UUIDs', () => {
    const input = 'session_id: 550e8400-e29b-41d4-a716-446655440000';
    expect(redact(input)).toBe(input);
  });

  it('does NOT redact short lowercase assignments', () => {
    expect(redact('token=ab')).toBe('token=ab');
  });
});
