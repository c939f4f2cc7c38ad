import { describe, it, expect } from 'vitest';
import { wrapText, formatRecord, formatDetails, formatFamily } from '../src/format.js';

const LONG_NAME = 'A very long name that exceeds fifty characters in total length';

describe('wrapText', () => {
  it('returns short strings unchanged', () => {
    expect(wrapText('Ravi Kumar')).toBe('Ravi Kumar');
    expect(wrapText('')).toBe('');
  });

  it('leaves a string of exactly the threshold alone', () => {
    const fifty = 'word '.repeat(10).slice(0, 50);
    expect(fifty).toHaveLength(50);
    expect(wrapText(fifty)).toBe(fifty);
  });

  it('packs words greedily into lines of at most 50 characters', () => {
    expect(wrapText(LONG_NAME)).toBe(
      'A very long name that exceeds fifty characters in\ntotal length'
    );
  });

  it('keeps an over-long word intact on its own line', () => {
    const word = 'x'.repeat(60);
    expect(wrapText(`${word} tail`)).toBe(`${word}\ntail`);
    expect(wrapText(`head ${word}`)).toBe(`head\n${word}`);
    expect(wrapText(word)).toBe(word);
  });

  it('collapses runs of whitespace between words', () => {
    const text = 'alpha\tbeta   gamma\n' + 'delta '.repeat(8);
    expect(wrapText(text)).toBe('alpha beta gamma delta delta delta delta delta\ndelta delta delta');
  });

  it('honours a custom width', () => {
    expect(wrapText('one two three four', 9)).toBe('one two\nthree\nfour');
  });

  describe('line and word properties', () => {
    const samples = [
      LONG_NAME,
      'lorem ipsum dolor sit amet '.repeat(7),
      'S/O Ramesh Kumar, House No 12, Gali No 4, Near Old Water Tank, Sector 9, Test Nagar',
      `${'y'.repeat(55)} short ${'z'.repeat(70)} end of the address line that goes on`,
    ];

    for (const text of samples) {
      it(`holds for "${text.slice(0, 20)}…"`, () => {
        const lines = wrapText(text).split('\n');
        for (const line of lines) {
          if (line.length > 50) expect(line.includes(' ')).toBe(false);
        }
        expect(lines.join(' ').split(' ')).toEqual(text.split(/\s+/).filter(Boolean));
      });
    }
  });
});

describe('formatRecord', () => {
  it('wraps top-level strings only', () => {
    const nested = { bio: LONG_NAME };
    const out = formatRecord({ name: LONG_NAME, age: 30, city: 'Pune', nested, tags: [LONG_NAME] });

    expect(out.name).toBe('A very long name that exceeds fifty characters in\ntotal length');
    expect(out.age).toBe(30);
    expect(out.city).toBe('Pune');
    expect(out.nested).toBe(nested);
    expect(out.tags).toEqual([LONG_NAME]);
  });

  it('copies a "__proto__" field as an ordinary field', () => {
    const out = formatRecord(JSON.parse('{"__proto__": {"x": 1}, "name": "n"}'));

    expect(Object.keys(out)).toEqual(['__proto__', 'name']);
    expect(Object.getOwnPropertyDescriptor(out, '__proto__')?.value).toEqual({ x: 1 });
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
  });
});

describe('formatDetails', () => {
  it('maps over sequences, formatting only mapping elements', () => {
    expect(formatDetails([{ name: LONG_NAME }, 'raw', 7])).toEqual([
      { name: 'A very long name that exceeds fifty characters in\ntotal length' },
      'raw',
      7,
    ]);
  });

  it('formats a single mapping', () => {
    expect(formatDetails({ name: LONG_NAME })).toEqual({
      name: 'A very long name that exceeds fifty characters in\ntotal length',
    });
  });

  it('passes other values through', () => {
    expect(formatDetails(LONG_NAME)).toBe(LONG_NAME);
    expect(formatDetails(null)).toBeNull();
  });
});

describe('formatFamily', () => {
  const wrapped = 'A very long name that exceeds fifty characters in\ntotal length';

  it('rebuilds a mapping field by field', () => {
    const out = formatFamily({
      members: [{ name: LONG_NAME, relation: 'Father' }, 'unknown'],
      head: { name: LONG_NAME },
      note: LONG_NAME,
      count: 2,
    });

    expect(out).toEqual({
      members: [{ name: wrapped, relation: 'Father' }, 'unknown'],
      head: { name: wrapped },
      note: LONG_NAME,
      count: 2,
    });
  });

  it('copies a "__proto__" field as an ordinary field', () => {
    const out = formatFamily(JSON.parse('{"__proto__": [1], "members": []}'));

    expect(Object.getOwnPropertyDescriptor(out, '__proto__')?.value).toEqual([1]);
    expect(Object.keys(out ?? {})).toEqual(['__proto__', 'members']);
  });

  it('passes non-mappings through verbatim', () => {
    const list = [{ name: LONG_NAME }];
    expect(formatFamily(list)).toBe(list);
    expect(formatFamily('none')).toBe('none');
  });
});
