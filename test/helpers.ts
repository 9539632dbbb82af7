import { mkdtemp, rm, writeFile, mkdir } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { Histogram } from "../src/analyzer/histogram";
import { EntropyAnalyzer } from "../src/analyzer/entropy";
import type { FileAnalysis } from "../src/analyzer/analysis";
import { BYTE_ALPHABET, type SymbolAlphabet } from "../src/analyzer/symbols";

export async function* chunksOf(...parts: number[][]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield Uint8Array.from(part);
  }
}

export function analysisOf(
  path: string,
  bytes: number[],
  alphabet: SymbolAlphabet = BYTE_ALPHABET
): FileAnalysis {
  const histogram = Histogram.fromBytes(Uint8Array.from(bytes), alphabet);
  return { path, histogram, report: EntropyAnalyzer.derive(histogram) };
}

/** Deterministic pseudo-random bytes (mulberry32). */
export function pseudoRandomBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    out[i] = ((t ^ (t >>> 14)) >>> 0) & 0xff;
  }
  return out;
}

export class TempDir {
  path = "";

  async create(): Promise<void> {
    this.path = await mkdtemp(join(tmpdir(), "byte-entropy-"));
  }

  async remove(): Promise<void> {
    if (this.path) {
      await rm(this.path, { recursive: true, force: true });
    }
  }

  async write(relativePath: string, bytes: number[] | Uint8Array): Promise<string> {
    const fullPath = join(this.path, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, Uint8Array.from(bytes));
    return fullPath;
  }
}
