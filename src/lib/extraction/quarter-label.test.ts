import { describe, it, expect } from '@jest/globals';
import {
  compareQuarterKeys,
  expandConfusions,
  formatQuarterKey,
  normalizeQuarterLabel,
  parseQuarterKey,
  parseQuarterText,
} from './quarter-label';

describe('parseQuarterText', () => {
  it('reads a clean label', () => {
    expect(parseQuarterText("Q1'14")).toEqual({ quarter: 1, year: 2014 });
  });

  it.each(["Q1'14", '0114', 'Q1I4', "O1'l4", 'q1 14'])('reads %s as Q1 2014', (text) => {
    expect(parseQuarterText(text)).toEqual({ quarter: 1, year: 2014 });
  });

  it('ignores trailing characters after the year', () => {
    expect(parseQuarterText("Q3'16E")).toEqual({ quarter: 3, year: 2016 });
  });

  it('reads the year digits through confusions', () => {
    expect(parseQuarterText("Q2'I7")).toEqual({ quarter: 2, year: 2017 });
  });

  it('reads a label followed by a long run of text', () => {
    expect(parseQuarterText("Q1'14 EPS estimate")).toEqual({ quarter: 1, year: 2014 });
  });

  it('rejects quarters outside 1-4', () => {
    expect(parseQuarterText("Q5'14")).toBeNull();
    expect(parseQuarterText("Q0'14")).toBeNull();
  });

  it('rejects one-digit years', () => {
    expect(parseQuarterText("Q1'4")).toBeNull();
  });

  it('rejects plain numbers', () => {
    expect(parseQuarterText('2016')).toBeNull();
    expect(parseQuarterText('27.85')).toBeNull();
  });

  it('rejects empty text', () => {
    expect(parseQuarterText('')).toBeNull();
  });
});

describe('expandConfusions', () => {
  it('lists the literal reading first', () => {
    expect(expandConfusions('0I')).toEqual(['01', 'Q1']);
  });

  it('only expands the first eight characters', () => {
    const readings = expandConfusions('OOOOOOOOOOOO');
    expect(readings).toHaveLength(256);
    expect(readings.every((r) => r.length === 8)).toBe(true);
    expect(expandConfusions("Q1'14 EPS estimate")).toEqual(["Q1'14 EP", "01'14 EP"]);
  });

  it('leaves characters outside the confusion classes alone', () => {
    expect(expandConfusions('A7')).toEqual(['A7']);
  });
});

describe('normalizeQuarterLabel', () => {
  it('keeps the box and the raw text', () => {
    const box = { x0: 10, y0: 900, x1: 50, y1: 920 };
    expect(normalizeQuarterLabel({ text: '0414', box, confidence: 0.8 })).toEqual({
      quarter: 4,
      year: 2014,
      box,
      sourceText: '0414',
    });
  });

  it('returns null for non-labels', () => {
    const box = { x0: 0, y0: 0, x1: 1, y1: 1 };
    expect(normalizeQuarterLabel({ text: 'EPS', box, confidence: 1 })).toBeNull();
  });
});

describe('quarter keys', () => {
  it('formats with a two-digit year', () => {
    expect(formatQuarterKey(1, 2014)).toBe("Q1'14");
    expect(formatQuarterKey(4, 2005)).toBe("Q4'05");
  });

  it('parses back what it formats', () => {
    expect(parseQuarterKey("Q3'16")).toEqual({ quarter: 3, year: 2016 });
    expect(parseQuarterKey('Q3 2016')).toBeNull();
  });

  it('sorts chronologically', () => {
    const keys = ["Q2'17", "Q1'14", "Q4'14", "Q1'15"];
    expect([...keys].sort(compareQuarterKeys)).toEqual(["Q1'14", "Q4'14", "Q1'15", "Q2'17"]);
  });
});
