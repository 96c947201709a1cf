import { describe, it, expect } from '@jest/globals';
import { splitByParagraphs, splitBySentences, splitTextIntoChunks } from '@/services/text-chunking.js';

describe('splitBySentences', () => {
  it('does not break after common abbreviations', () => {
    expect(splitBySentences('Dr. Smith arrived. He sat down.')).toEqual(['Dr. Smith arrived.', 'He sat down.']);
  });

  it('keeps decimal numbers together', () => {
    expect(splitBySentences('It costs 3.5 coins. Wow.')).toEqual(['It costs 3.5 coins.', 'Wow.']);
  });

  it('keeps closing quotes with their sentence', () => {
    expect(splitBySentences('"Hello!" said the seal. The keeper waved.')).toEqual([
      '"Hello!" said the seal.',
      'The keeper waved.',
    ]);
  });
});

describe('splitByParagraphs', () => {
  it('splits on blank lines and drops empty paragraphs', () => {
    expect(splitByParagraphs('One.\n\n\nTwo.\n  \nThree.')).toEqual(['One.', 'Two.', 'Three.']);
  });
});

describe('splitTextIntoChunks', () => {
  it('returns nothing for blank text', () => {
    expect(splitTextIntoChunks('   ', 10)).toEqual([]);
  });

  it('returns short text as a single trimmed chunk', () => {
    expect(splitTextIntoChunks('  A short page.  ', 100)).toEqual(['A short page.']);
  });

  it('prefers paragraph breaks', () => {
    expect(splitTextIntoChunks('Para one.\n\nPara two.', 12)).toEqual(['Para one.', 'Para two.']);
  });

  it('packs sentences up to the limit', () => {
    const text = 'The boat woke. The sun rose. The gulls cried. The tide turned.';
    const chunks = splitTextIntoChunks(text, 30);

    expect(chunks).toEqual(['The boat woke.\n\nThe sun rose.', 'The gulls cried.', 'The tide turned.']);
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(30);
  });

  it('hard-splits a segment with no natural breaks', () => {
    expect(splitTextIntoChunks('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });
});
