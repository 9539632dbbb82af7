import { Histogram } from "./histogram";
import { shannonEntropy } from "./entropy";
import type { SymbolAlphabet } from "./symbols";
import { readChunks } from "../utils/io";

export interface WindowEntropy {
  position: number;
  size: number;
  entropy: number;
}

export interface WindowSummary {
  min: number;
  max: number;
  average: number;
}

/**
 * Entropy of consecutive, non-overlapping windows. A trailing partial window
 * is reported with its actual size.
 */
export async function analyzeWindows(
  stream: AsyncIterable<Uint8Array>,
  windowSize: number,
  alphabet: SymbolAlphabet
): Promise<WindowEntropy[]> {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new Error("Window size must be greater than 0");
  }

  const results: WindowEntropy[] = [];
  let position = 0;
  let current = new Histogram(alphabet);

  const flush = () => {
    results.push({
      position,
      size: current.totalBytes,
      entropy: shannonEntropy(current.counts, current.totalBytes),
    });
    position += current.totalBytes;
    current = new Histogram(alphabet);
  };

  for await (const chunk of stream) {
    let offset = 0;
    while (offset < chunk.length) {
      const take = Math.min(windowSize - current.totalBytes, chunk.length - offset);
      current.add(chunk.subarray(offset, offset + take));
      offset += take;
      if (current.totalBytes === windowSize) flush();
    }
  }

  if (current.totalBytes > 0) flush();

  return results;
}

export async function analyzeFileWindows(
  filePath: string,
  windowSize: number,
  alphabet: SymbolAlphabet
): Promise<WindowEntropy[]> {
  return analyzeWindows(readChunks(filePath), windowSize, alphabet);
}

export function summarizeWindows(windows: WindowEntropy[]): WindowSummary | null {
  if (windows.length === 0) return null;

  let min = Infinity;
  let max = 0;
  let sum = 0;
  for (const { entropy } of windows) {
    min = Math.min(min, entropy);
    max = Math.max(max, entropy);
    sum += entropy;
  }

  return { min, max, average: sum / windows.length };
}
