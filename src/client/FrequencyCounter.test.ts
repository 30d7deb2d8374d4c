import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { OrderedMap } from '../tree/OrderedMap';
import { FrequencyCounter } from './FrequencyCounter';

const TEXT = 'it was the best of times it was the worst of times';

describe('FrequencyCounter', () => {
  it('finds the most frequent word, smallest word first on ties', () => {
    const counter = new FrequencyCounter(1);
    counter.addLine(TEXT);

    expect(counter.mostFrequent()).toEqual({ word: 'it', count: 2 });
    expect(counter.stats()).toEqual({ words: 12, distinct: 7 });
    expect(counter.count('best')).toBe(1);
    expect(counter.count('age')).toBe(0);
  });

  it('ignores words shorter than the threshold', () => {
    const counter = new FrequencyCounter(5);
    counter.addLine(TEXT);

    expect(counter.mostFrequent()).toEqual({ word: 'times', count: 2 });
    expect(counter.stats()).toEqual({ words: 3, distinct: 2 });
  });

  it('skips blank tokens around whitespace', () => {
    const counter = new FrequencyCounter(0);
    counter.addLine('  alpha \t beta  ');

    expect(counter.stats()).toEqual({ words: 2, distinct: 2 });
  });

  it('returns null when nothing was counted', () => {
    const counter = new FrequencyCounter(3);
    counter.addLine('a b c');

    expect(counter.mostFrequent()).toBeNull();
    expect(counter.stats()).toEqual({ words: 0, distinct: 0 });
  });

  it('counts into the table it was given', () => {
    const table = new OrderedMap<string, number>();
    const counter = new FrequencyCounter(1, table);
    counter.addLine('b a b');

    expect(table.entries()).toEqual([['a', 1], ['b', 2]]);
    table.assertInvariants();
  });

  it('consumes a stream line by line', async () => {
    const counter = new FrequencyCounter(1);
    const input = Readable.from([Buffer.from('line one\nline'), Buffer.from(' two\n')]);

    const stats = await counter.countStream(input);

    expect(stats).toEqual({ words: 4, distinct: 3 });
    expect(counter.mostFrequent()).toEqual({ word: 'line', count: 2 });
  });
});
