import type { SymbolAlphabet } from "./symbols";
import { readChunks } from "../utils/io";

/**
 * Symbol frequency table for one byte stream.
 *
 * The sum of `counts` always equals `totalBytes`.
 */
export class Histogram {
  readonly alphabet: SymbolAlphabet;
  private readonly _counts: number[];
  private _totalBytes = 0;

  constructor(alphabet: SymbolAlphabet) {
    this.alphabet = alphabet;
    this._counts = new Array<number>(alphabet.size).fill(0);
  }

  static fromBytes(data: Uint8Array, alphabet: SymbolAlphabet): Histogram {
    const histogram = new Histogram(alphabet);
    histogram.add(data);
    return histogram;
  }

  get counts(): readonly number[] {
    return this._counts;
  }

  get totalBytes(): number {
    return this._totalBytes;
  }

  add(chunk: Uint8Array): void {
    const { _counts: counts, alphabet } = this;
    for (let i = 0; i < chunk.length; i++) {
      const symbol = alphabet.symbolOf(chunk[i]!);
      counts[symbol] = counts[symbol]! + 1;
    }
    this._totalBytes += chunk.length;
  }

  /** Nonzero symbols ordered by descending count, then by symbol. */
  ranked(): Array<{ symbol: number; count: number }> {
    const entries: Array<{ symbol: number; count: number }> = [];
    this.counts.forEach((count, symbol) => {
      if (count > 0) entries.push({ symbol, count });
    });
    return entries.sort((a, b) => b.count - a.count || a.symbol - b.symbol);
  }
}

export async function accumulate(
  stream: AsyncIterable<Uint8Array>,
  alphabet: SymbolAlphabet
): Promise<Histogram> {
  const histogram = new Histogram(alphabet);
  for await (const chunk of stream) {
    histogram.add(chunk);
  }
  return histogram;
}

export async function accumulateFile(
  filePath: string,
  alphabet: SymbolAlphabet
): Promise<Histogram> {
  return accumulate(readChunks(filePath), alphabet);
}
