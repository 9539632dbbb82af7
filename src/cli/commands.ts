import type { CliOptions } from "./parser";
import { analyzeFile, type FileAnalysis } from "../analyzer/analysis";
import { compareAnalyses, type FileComparison } from "../analyzer/comparison";
import { getAlphabet } from "../analyzer/symbols";
import {
  analyzeFileWindows,
  summarizeWindows,
  type WindowEntropy,
} from "../analyzer/window";
import { EntropyReporter } from "../report/formatter";
import {
  renderDistribution,
  renderFrequencyChart,
  renderWindowGraph,
} from "../report/charts";
import { collectFiles } from "../utils/io";
import { ProgressTracker } from "../utils/progress";

export type OutputWriter = (text: string) => void;

export interface AnalyzeResult {
  analyses: FileAnalysis[];
  failures: Array<{ path: string; message: string }>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Commands {
  private readonly write: OutputWriter;

  constructor(write?: OutputWriter) {
    this.write =
      write ??
      ((text) => {
        process.stdout.write(text);
      });
  }

  /**
   * Analyzes every collected file in order. A file that cannot be read is
   * reported on stderr and skipped. Throws when no operand yields a file.
   */
  async analyze(options: CliOptions): Promise<AnalyzeResult> {
    const files = await collectFiles(options.input, {
      recursive: options.recursive,
      extension: options.extension,
    });
    if (files.length === 0) {
      throw new Error("No files found to analyze");
    }
    const result: AnalyzeResult = { analyses: [], failures: [] };

    const wantsCharts = options.histogram || options.frequency;
    if (wantsCharts && options.format !== "text") {
      console.warn(
        "Warning: --histogram and --frequency only apply to text output"
      );
    }

    const alphabet = getAlphabet(options.alphabet);
    const progress = new ProgressTracker(files.length, options.progress);

    for (const file of files) {
      progress.tick(file);
      try {
        result.analyses.push(await analyzeFile(file, alphabet));
      } catch (error) {
        const message = errorMessage(error);
        progress.clear();
        console.error(message);
        result.failures.push({ path: file, message });
      }
    }
    progress.finish();

    if (options.format !== "text") {
      this.write(EntropyReporter.format(options.format, result.analyses));
      return result;
    }

    for (const analysis of result.analyses) {
      this.write(EntropyReporter.formatText(analysis));
      if (options.histogram) {
        this.write(renderDistribution(analysis) + "\n");
      }
      if (options.frequency) {
        this.write(renderFrequencyChart(analysis, options.top) + "\n");
      }
    }

    return result;
  }

  async window(options: CliOptions): Promise<WindowEntropy[]> {
    const windowSize = options.windowSize;
    if (windowSize === undefined) {
      throw new Error("No window size specified");
    }

    const files = await collectFiles(options.input, {
      recursive: options.recursive,
      extension: options.extension,
    });
    const file = files[0];
    if (file === undefined) {
      throw new Error("No files found to analyze");
    }
    if (files.length > 1) {
      console.warn(
        "Warning: Sliding window analysis works on a single file. Analyzing first file only."
      );
    }

    const windows = await analyzeFileWindows(
      file,
      windowSize,
      getAlphabet(options.alphabet)
    );
    if (windows.length === 0) {
      throw new Error("File is empty");
    }

    let output = EntropyReporter.formatWindowHeader(file, windowSize, windows) + "\n";
    output += options.graph
      ? renderWindowGraph(windows)
      : EntropyReporter.formatWindowTable(windows);

    const summary = summarizeWindows(windows);
    if (summary) {
      output += "\n" + EntropyReporter.formatWindowSummary(summary);
    }
    this.write(output);

    return windows;
  }

  async compare(options: CliOptions): Promise<FileComparison> {
    const first = options.input[0];
    const second = options.compareWith;
    if (first === undefined || second === undefined) {
      throw new Error("--compare requires exactly one file operand");
    }

    const alphabet = getAlphabet(options.alphabet);
    const comparison = compareAnalyses(
      await analyzeFile(first, alphabet),
      await analyzeFile(second, alphabet)
    );
    this.write(EntropyReporter.formatComparison(comparison));

    return comparison;
  }
}
