import { describe, it, expect } from 'vitest';
import {
  extractJson,
  extractPreference,
  matchBoardWord,
  matchVote,
  parseClueResponse,
  parseGuessResponse,
} from './parsing.js';

describe('extractJson', () => {
  it('parses a bare object', () => {
    expect(extractJson('{"a": 1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('drops think blocks and reads a fenced block', () => {
    const raw = '<think>{"x": 1}</think>\n```json\n{"guess": "sun"}\n```';
    expect(extractJson(raw)).toEqual({ ok: true, value: { guess: 'sun' } });
  });

  it('finds an object surrounded by prose', () => {
    expect(extractJson('Sure! {"vote": "end"} hope that helps')).toEqual({ ok: true, value: { vote: 'end' } });
  });

  it('fails on text without an object', () => {
    expect(extractJson('no json here')).toEqual({ ok: false, raw: 'no json here', reason: 'no JSON object found' });
    expect(extractJson('[1, 2]').ok).toBe(false);
  });
});

describe('parseClueResponse', () => {
  it('reads the JSON form and derives the count from the targets', () => {
    const raw = '{"clue": "Ocean", "targets": ["Wave", " Ship "], "reasoning": "sea"}';
    expect(parseClueResponse(raw)).toEqual({
      ok: true,
      value: { word: 'ocean', count: 2, targets: ['Wave', 'Ship'], reasoning: 'sea' },
    });
  });

  it('reads the labelled line form', () => {
    const result = parseClueResponse('CLUE: Ocean\nNUMBER: 3\nTARGETS: Wave, Ship');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.word).toBe('ocean');
      expect(result.value.targets).toEqual(['Wave', 'Ship']);
      expect(result.value.count).toBe(2);
    }
  });

  it.each([
    ['{"clue": "deep sea", "targets": ["Wave"]}', 'clue "deep sea" is not a single word'],
    ['{"clue": "ocean"}', 'missing target words'],
    ['nothing useful', 'missing clue word'],
  ])('rejects %s', (raw, reason) => {
    const result = parseClueResponse(raw);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe(reason);
  });
});

describe('matchBoardWord', () => {
  const words = ['Sun', 'Moon'];

  it('maps end-turn phrasings to the sentinel', () => {
    expect(matchBoardWord('End Turn', words)).toBe('end');
    expect(matchBoardWord('end_turn', words)).toBe('end');
  });

  it('ignores quotes and trailing punctuation', () => {
    expect(matchBoardWord('"Sun".', words)).toBe('sun');
  });

  it('accepts a board word inside a short phrase', () => {
    expect(matchBoardWord('the moon', words)).toBe('moon');
  });

  it('returns undefined for anything else', () => {
    expect(matchBoardWord('xyz', words)).toBeUndefined();
  });
});

describe('parseGuessResponse', () => {
  it('reads the JSON form', () => {
    expect(parseGuessResponse('{"reasoning": "bright", "guess": "SUN"}', ['Sun', 'Moon'])).toEqual({
      ok: true,
      value: { guess: 'sun', reasoning: 'bright' },
    });
  });

  it('reads the labelled line form', () => {
    expect(parseGuessResponse('REASONING: it is hot\nDECISION: end', ['Sun'])).toEqual({
      ok: true,
      value: { guess: 'end', reasoning: 'it is hot' },
    });
  });

  it('rejects a word that is not on the board', () => {
    const result = parseGuessResponse('{"guess": "Mars"}', ['Sun']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('"Mars" is not an unrevealed board word');
  });
});

describe('matchVote', () => {
  const options = ['end', 'sun'];

  it('reads a JSON vote', () => {
    expect(matchVote('{"vote": "Sun"}', options)).toEqual({ ok: true, value: 'sun' });
  });

  it('finds an option mentioned in prose', () => {
    expect(matchVote('I vote for sun, definitely', options)).toEqual({ ok: true, value: 'sun' });
  });

  it('fails when no option is named', () => {
    expect(matchVote('pass', options).ok).toBe(false);
  });
});

describe('extractPreference', () => {
  const cards = [
    { word: 'Sun', revealed: false },
    { word: 'Moon', revealed: false },
    { word: 'Star', revealed: true },
  ];

  it('prefers an end-turn phrase', () => {
    expect(extractPreference("Let's end the turn, the sun is risky", cards)).toEqual({ ok: true, value: 'end' });
  });

  it('takes a quoted unrevealed word over a bare mention', () => {
    const message = "I suggest we guess 'moon'. My reasoning: the sun is too obvious";
    expect(extractPreference(message, cards)).toEqual({ ok: true, value: 'moon' });
  });

  it('falls back to the first unrevealed word in board order', () => {
    expect(extractPreference('Maybe moon or sun', cards)).toEqual({ ok: true, value: 'sun' });
  });

  it('ignores revealed words and partial matches', () => {
    expect(extractPreference("I suggest we guess 'Star'", cards).ok).toBe(false);
    expect(extractPreference('What a sunny day', cards).ok).toBe(false);
  });
});
