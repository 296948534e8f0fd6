import { describe, expect, it } from 'vitest';
import { countMessagesTokens, countTokens } from '../token-counter.js';

describe('countTokens', () => {
  it('should return 0 for empty text', () => {
    expect(countTokens('')).toBe(0);
  });

  it('should weigh whitespace and punctuation', () => {
    // ceil(11 / 4) + 0.1 for the single space
    expect(countTokens('hello world')).toBe(4);
    // ceil(12 / 4) + 0.1 + 0.05 for the '!'
    expect(countTokens('hello world!')).toBe(4);
  });

  it('should add per-message overhead', () => {
    expect(countMessagesTokens([{ content: 'hello world' }, { content: '' }])).toBe(12);
  });
});
