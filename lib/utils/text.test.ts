import { describe, expect, it } from 'vitest';
import { chunkText, escapeMarkdown, pluralize } from './text';

describe('chunkText', () => {
  it('returns short text as a single chunk', () => {
    expect(chunkText('hello', 10)).toEqual(['hello']);
  });

  it('cuts at the last newline inside each window', () => {
    expect(chunkText('ab\ncd\nef', 5)).toEqual(['ab', 'cd\nef']);
  });

  it('hard-cuts lines longer than the window', () => {
    expect(chunkText('aaaaaaaaaa', 4)).toEqual(['aaaa', 'aaaa', 'aa']);
  });

  it('keeps every chunk within the 4000 character default', () => {
    const line = 'x'.repeat(99);
    const text = Array.from({ length: 100 }, () => line).join('\n');
    const chunks = chunkText(text);

    expect(chunks).toHaveLength(3);
    expect(chunks.every((chunk) => chunk.length <= 4000)).toBe(true);
    expect(chunks.join('\n')).toBe(text);
  });
});

describe('escapeMarkdown', () => {
  it('escapes legacy Markdown control characters', () => {
    expect(escapeMarkdown('a_b *c* `d` [e]')).toBe('a\\_b \\*c\\* \\`d\\` \\[e]');
  });
});

describe('pluralize', () => {
  it('uses the singular form only for one', () => {
    expect(pluralize(1, 'transaction')).toBe('1 transaction');
    expect(pluralize(0, 'transaction')).toBe('0 transactions');
    expect(pluralize(3, 'entry', 'entries')).toBe('3 entries');
  });
});
