import type { FileAnalysis } from "./analysis";

export interface FileComparison {
  file1: string;
  file2: string;
  entropy1: number;
  entropy2: number;
  entropyDiff: number;
  /** `null` when the first file has zero entropy. */
  entropyDiffPercent: number | null;
  size1: number;
  size2: number;
  sizeDiff: number;
  sizeDiffPercent: number;
}

export function compareAnalyses(
  first: FileAnalysis,
  second: FileAnalysis
): FileComparison {
  const entropy1 = first.report.entropy;
  const entropy2 = second.report.entropy;
  const size1 = first.report.totalBytes;
  const size2 = second.report.totalBytes;

  return {
    file1: first.path,
    file2: second.path,
    entropy1,
    entropy2,
    entropyDiff: entropy2 - entropy1,
    entropyDiffPercent:
      entropy1 > 0 ? ((entropy2 - entropy1) / entropy1) * 100 : null,
    size1,
    size2,
    sizeDiff: size2 - size1,
    sizeDiffPercent: size1 > 0 ? ((size2 - size1) / size1) * 100 : 0,
  };
}
