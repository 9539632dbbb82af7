import type { FileAnalysis } from "../analyzer/analysis";
import type { FileComparison } from "../analyzer/comparison";
import type { EntropyReport } from "../analyzer/entropy";
import { AlphabetKind } from "../analyzer/symbols";
import type { WindowEntropy, WindowSummary } from "../analyzer/window";

export type OutputFormat = "text" | "json" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json", "csv"];

const RULE = "-".repeat(39);
const LABEL_WIDTH = 30;

const CSV_COLUMNS = [
  "file",
  "alphabet",
  "size_bytes",
  "entropy",
  "entropy_per_byte",
  "entropy_of_file_bits",
  "entropy_of_file_bytes",
  "delta_bytes",
  "best_coding_ratio",
];

export class EntropyReporter {
  static format(format: OutputFormat, analyses: FileAnalysis[]): string {
    switch (format) {
      case "json":
        return this.formatJson(analyses);
      case "csv":
        return this.formatCsv(analyses);
      case "text":
        return analyses.map((a) => this.formatText(a)).join("");
    }
  }

  static formatText({ path, report }: FileAnalysis): string {
    let output = `--- File: ${path} ---\n`;
    output += RULE + "\n";

    if (report.alphabet === AlphabetKind.BIT_POPULATION) {
      output += `Bit-level informational entropy: ${this.fixed(report.entropy)} bits\n`;
    } else {
      output += this.line(
        "Entropy per byte",
        `${this.fixed(report.entropy)} bits (${this.fixed(report.entropyPerByte)} bytes)`
      );
      output += this.line(
        "Entropy of file",
        `${this.fixed(report.entropyOfFileBits)} bits (${this.fixed(
          report.entropyOfFileBytes
        )} bytes)`
      );
      output += this.line("Size of file", `${report.totalBytes} bytes`);
      output += this.line(
        "Delta",
        `${this.fixed(report.deltaBytes)} bytes (compressible theoretically)`
      );
      output += this.line(
        "Best Theoretical Coding ratio",
        report.bestCodingRatio === null ? "inf" : this.fixed(report.bestCodingRatio)
      );
    }

    if (report.empty) {
      output += this.line("Note", "empty input");
    }

    output += RULE + "\n\n";
    return output;
  }

  static formatJson(analyses: FileAnalysis[]): string {
    const rows: Array<{ file: string } & EntropyReport> = analyses.map(
      ({ path, report }) => ({ file: path, ...report })
    );
    return JSON.stringify(rows, null, 2) + "\n";
  }

  static formatCsv(analyses: FileAnalysis[]): string {
    let output = CSV_COLUMNS.join(",") + "\n";

    for (const { path, report } of analyses) {
      const fields = [path, report.alphabet, String(report.totalBytes), String(report.entropy)];
      if (report.alphabet === AlphabetKind.BYTE) {
        fields.push(
          String(report.entropyPerByte),
          String(report.entropyOfFileBits),
          String(report.entropyOfFileBytes),
          String(report.deltaBytes),
          report.bestCodingRatio === null ? "inf" : String(report.bestCodingRatio)
        );
      } else {
        fields.push("", "", "", "", "");
      }
      output += fields.map((f) => this.escapeCsv(f)).join(",") + "\n";
    }

    return output;
  }

  static formatComparison(comparison: FileComparison): string {
    const banner = "=".repeat(70);
    let output = `${banner}\nFile Comparison\n${banner}\n`;
    output += `File 1: ${comparison.file1}\n`;
    output += `File 2: ${comparison.file2}\n`;

    output += "\nEntropy Comparison:\n";
    output += `  File 1: ${this.fixed(comparison.entropy1)} bits\n`;
    output += `  File 2: ${this.fixed(comparison.entropy2)} bits\n`;
    output += `  Difference: ${this.signed(comparison.entropyDiff, 6)} bits\n`;
    output += `  Percentage: ${
      comparison.entropyDiffPercent === null
        ? "N/A"
        : `${this.signed(comparison.entropyDiffPercent, 2)}%`
    }\n`;

    output += "\nSize Comparison:\n";
    output += `  File 1: ${comparison.size1} bytes\n`;
    output += `  File 2: ${comparison.size2} bytes\n`;
    output += `  Difference: ${comparison.sizeDiff} bytes (${this.signed(
      comparison.sizeDiffPercent,
      2
    )}%)\n`;
    output += banner + "\n";

    return output;
  }

  static formatWindowHeader(
    path: string,
    windowSize: number,
    windows: WindowEntropy[]
  ): string {
    let output = `--- Sliding Window Entropy Analysis: ${path} ---\n`;
    output += `Window size: ${windowSize} bytes\n`;
    output += `Number of windows: ${windows.length}\n`;
    return output;
  }

  static formatWindowTable(windows: WindowEntropy[]): string {
    let output = "";
    output += "Position (bytes)".padEnd(18);
    output += "Window Size".padStart(12);
    output += "Entropy (bits)".padStart(16);
    output += "\n" + "-".repeat(46) + "\n";

    for (const window of windows) {
      output += String(window.position).padEnd(18);
      output += String(window.size).padStart(12);
      output += this.fixed(window.entropy).padStart(16);
      output += "\n";
    }

    return output;
  }

  static formatWindowSummary(summary: WindowSummary): string {
    let output = "Statistics:\n";
    output += `  Minimum entropy: ${this.fixed(summary.min)} bits\n`;
    output += `  Maximum entropy: ${this.fixed(summary.max)} bits\n`;
    output += `  Average entropy: ${this.fixed(summary.average)} bits\n`;
    return output;
  }

  private static line(label: string, value: string): string {
    return `${label.padEnd(LABEL_WIDTH)}: ${value}\n`;
  }

  private static fixed(value: number): string {
    return value.toFixed(6);
  }

  private static signed(value: number, digits: number): string {
    return `${value >= 0 ? "+" : ""}${value.toFixed(digits)}`;
  }

  private static escapeCsv(field: string): string {
    if (/[",\n\r]/.test(field)) {
      return `"${field.replace(/"/g, '""')}"`;
    }
    return field;
  }
}
