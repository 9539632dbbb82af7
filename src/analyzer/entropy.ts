import type { Histogram } from "./histogram";
import { AlphabetKind } from "./symbols";

export const BITS_PER_BYTE = 8;

export interface ByteEntropyReport {
  alphabet: AlphabetKind.BYTE;
  totalBytes: number;
  empty: boolean;
  /** Bits per symbol. */
  entropy: number;
  entropyPerByte: number;
  entropyOfFileBits: number;
  entropyOfFileBytes: number;
  /** Bytes an optimal coder would save; zero or negative for incompressible data. */
  deltaBytes: number;
  /** `null` when the input is a single repeated byte (entropy 0). */
  bestCodingRatio: number | null;
}

export interface BitPopulationEntropyReport {
  alphabet: AlphabetKind.BIT_POPULATION;
  totalBytes: number;
  empty: boolean;
  entropy: number;
}

export type EntropyReport = ByteEntropyReport | BitPopulationEntropyReport;

/**
 * Shannon entropy in bits per symbol: H = -Σ p(s) * log2(p(s)).
 * Zero counts are skipped.
 */
export function shannonEntropy(counts: ArrayLike<number>, total: number): number {
  if (total === 0) return 0;

  let entropy = 0;
  for (let i = 0; i < counts.length; i++) {
    const count = counts[i]!;
    if (count > 0) {
      const probability = count / total;
      entropy -= probability * Math.log2(probability);
    }
  }

  return entropy;
}

export class EntropyAnalyzer {
  static derive(histogram: Histogram): EntropyReport {
    const totalBytes = histogram.totalBytes;
    const empty = totalBytes === 0;
    const entropy = empty ? 0 : shannonEntropy(histogram.counts, totalBytes);

    if (histogram.alphabet.kind === AlphabetKind.BIT_POPULATION) {
      return { alphabet: AlphabetKind.BIT_POPULATION, totalBytes, empty, entropy };
    }

    if (empty) {
      return {
        alphabet: AlphabetKind.BYTE,
        totalBytes,
        empty,
        entropy: 0,
        entropyPerByte: 0,
        entropyOfFileBits: 0,
        entropyOfFileBytes: 0,
        deltaBytes: 0,
        bestCodingRatio: 0,
      };
    }

    const entropyOfFileBits = entropy * totalBytes;
    const entropyOfFileBytes = entropyOfFileBits / BITS_PER_BYTE;

    return {
      alphabet: AlphabetKind.BYTE,
      totalBytes,
      empty,
      entropy,
      entropyPerByte: entropy / BITS_PER_BYTE,
      entropyOfFileBits,
      entropyOfFileBytes,
      deltaBytes: totalBytes - entropyOfFileBytes,
      bestCodingRatio: entropy === 0 ? null : BITS_PER_BYTE / entropy,
    };
  }
}
