import { accumulateFile, type Histogram } from "./histogram";
import { EntropyAnalyzer, type EntropyReport } from "./entropy";
import type { SymbolAlphabet } from "./symbols";

export interface FileAnalysis {
  path: string;
  histogram: Histogram;
  report: EntropyReport;
}

export async function analyzeFile(
  filePath: string,
  alphabet: SymbolAlphabet
): Promise<FileAnalysis> {
  const histogram = await accumulateFile(filePath, alphabet);
  return {
    path: filePath,
    histogram,
    report: EntropyAnalyzer.derive(histogram),
  };
}
