import { describe, it, expect } from 'vitest';
import { extractFeatures, extractWords, splitSentences, countHashtags, firstLine } from './features.js';

const LIST_POST =
  'Is productivity a lie? Here are 3 things that changed everything for me: 1) ... 2) ... 3) ... Try this today.';

describe('splitSentences', () => {
  it('splits on terminal punctuation and line breaks', () => {
    expect(splitSentences('Hello world. How are you?\nFine')).toEqual(['Hello world.', 'How are you?', 'Fine']);
  });

  it('drops hashtags and punctuation-only segments', () => {
    expect(splitSentences('Ship it. #launch #ai\n...')).toEqual(['Ship it.']);
  });
});

describe('extractWords', () => {
  it('keeps apostrophes inside words', () => {
    expect(extractWords("Don't stop, it's 2024!")).toEqual(["Don't", 'stop', "it's", '2024']);
  });
});

describe('countHashtags', () => {
  it('counts only tags that start a word', () => {
    expect(countHashtags('#one two #three email@x.com#no')).toBe(2);
  });
});

describe('firstLine', () => {
  it('skips blank lines and caps the opening length', () => {
    expect(firstLine('\n\n  Hello there  \nsecond')).toBe('Hello there');
    expect(firstLine('a'.repeat(200))).toHaveLength(140);
  });
});

describe('extractFeatures', () => {
  it('reads the hook signals of the opening', () => {
    const f = extractFeatures(LIST_POST);
    expect(f.openingHasQuestion).toBe(true);
    expect(f.openingHasNumeral).toBe(true);
    expect(f.openingArousalWords).toEqual(['lie', 'changed', 'everything']);
    expect(f.leadSentenceWordCount).toBe(4);
    expect(f.startsWithWeakOpener).toBe(false);
  });

  it('reads structure signals', () => {
    const f = extractFeatures(LIST_POST);
    expect(f.listMarkerCount).toBe(3);
    expect(f.sentenceWordCounts).toEqual([4, 10, 1, 1, 3]);
    expect(f.hasCallToAction).toBe(true);
    expect(f.paragraphCount).toBe(1);
  });

  it('reads niche signals', () => {
    const f = extractFeatures(
      'We shipped Postgres 16 support to Acme customers in 3 days, cutting query latency by 40%.',
    );
    expect(f.numeralCount).toBe(3);
    expect(f.namedEntities).toEqual(['Postgres', 'Acme']);
    expect(f.longWordCount).toBe(2);
    expect(f.hasUnits).toBe(true);
    expect(f.fillerWords).toEqual([]);
  });

  it('detects units after long numbers', () => {
    expect(extractFeatures(`Up ${'9'.repeat(40)}% this year`).hasUnits).toBe(true);
    expect(extractFeatures('1'.repeat(50_000)).hasUnits).toBe(false);
  });

  it('flags weak openers and filler', () => {
    const f = extractFeatures('I did some stuff today.');
    expect(f.startsWithWeakOpener).toBe(true);
    expect(f.fillerWords).toEqual(['some', 'stuff']);
    expect(f.hasCallToAction).toBe(false);
  });

  it('does not count the pronoun I as a named entity', () => {
    const f = extractFeatures("Then I said I'm done with Paris.");
    expect(f.namedEntities).toEqual(['Paris']);
  });

  it('ignores a trailing hashtag line when finding the closing sentence', () => {
    const f = extractFeatures('Big news today.\n\nFollow for more.\n\n#news #today');
    expect(f.hasCallToAction).toBe(true);
    expect(f.hashtagCount).toBe(2);
    expect(f.paragraphCount).toBe(3);
  });
});
