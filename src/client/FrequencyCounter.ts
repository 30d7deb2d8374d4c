/**
 * FrequencyCounter - most frequent word of at least a given length
 *
 * Counts live in an ordered symbol table, so the final scan visits words in
 * key order and a tie goes to the smallest word.
 */

import * as readline from 'readline';
import type { IOrderedSymbolTable } from '../interfaces/SymbolTable';
import { OrderedMap } from '../tree/OrderedMap';

export interface WordCount {
  readonly word: string;
  readonly count: number;
}

export interface FrequencyStats {
  readonly words: number;
  readonly distinct: number;
}

export class FrequencyCounter {
  private readonly table: IOrderedSymbolTable<string, number>;
  private readonly minLength: number;
  private words: number = 0;

  constructor(
    minLength: number,
    table: IOrderedSymbolTable<string, number> = new OrderedMap<string, number>()
  ) {
    this.minLength = minLength;
    this.table = table;
  }

  addLine(line: string): void {
    for (const word of line.split(/\s+/)) {
      if (word.length === 0 || word.length < this.minLength) {
        continue;
      }
      this.words++;
      const current = this.table.get(word);
      this.table.put(word, current === undefined ? 1 : current + 1);
    }
  }

  /**
   * Consume a stream line by line until it ends.
   */
  async countStream(input: NodeJS.ReadableStream): Promise<FrequencyStats> {
    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    for await (const line of lines) {
      this.addLine(line);
    }
    return this.stats();
  }

  mostFrequent(): WordCount | null {
    let best: WordCount | null = null;
    for (const word of this.table.keys()) {
      const count = this.table.get(word) ?? 0;
      if (best === null || count > best.count) {
        best = { word, count };
      }
    }
    return best;
  }

  count(word: string): number {
    return this.table.get(word) ?? 0;
  }

  stats(): FrequencyStats {
    return { words: this.words, distinct: this.table.size() };
  }
}
