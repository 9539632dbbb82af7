import type { FileAnalysis } from "../analyzer/analysis";
import { AlphabetKind } from "../analyzer/symbols";
import type { WindowEntropy } from "../analyzer/window";

const HISTOGRAM_WIDTH = 60;
const GRAPH_HEIGHT = 20;
const FREQUENCY_BAR_WIDTH = 30;
const BYTE_BIN_SIZE = 16;

const BANNER = "=".repeat(70);
const THIN_RULE = "─".repeat(70);

function bar(value: number, max: number, width: number): string {
  if (max <= 0) return "";
  return "█".repeat(Math.floor((value / max) * width));
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, "0");
}

function symbolLabel(kind: AlphabetKind, symbol: number): string {
  return kind === AlphabetKind.BYTE ? `0x${hex(symbol)}` : `${symbol} bits`;
}

export function renderDistribution({ path, histogram }: FileAnalysis): string {
  const kind = histogram.alphabet.kind;
  const rows: Array<{ label: string; count: number }> = [];

  if (kind === AlphabetKind.BYTE) {
    for (let start = 0; start < histogram.counts.length; start += BYTE_BIN_SIZE) {
      const bin = histogram.counts.slice(start, start + BYTE_BIN_SIZE);
      rows.push({
        label: `${hex(start)}-${hex(start + BYTE_BIN_SIZE - 1)}`,
        count: bin.reduce((sum, c) => sum + c, 0),
      });
    }
  } else {
    histogram.counts.forEach((count, symbol) => {
      rows.push({ label: `${symbol} bits`, count });
    });
  }

  const max = Math.max(...rows.map((r) => r.count));
  const labelWidth = Math.max(...rows.map((r) => r.label.length));
  const title =
    kind === AlphabetKind.BYTE
      ? "Byte Distribution Histogram"
      : "Bit-Population Distribution Histogram";

  let output = `${title}: ${path}\n${BANNER}\n`;
  for (const row of rows) {
    output += `${row.label.padEnd(labelWidth)} │${bar(
      row.count,
      max,
      HISTOGRAM_WIDTH
    )}│ ${row.count}\n`;
  }
  output += BANNER + "\n";
  return output;
}

export function renderFrequencyChart(
  { path, histogram }: FileAnalysis,
  topN: number
): string {
  const kind = histogram.alphabet.kind;
  const ranked = histogram.ranked();
  const total = histogram.totalBytes;
  const maxCount = ranked[0]?.count ?? 0;
  const noun = kind === AlphabetKind.BYTE ? "Bytes" : "Bit-Population Classes";

  let output = `Top ${topN} Most Frequent ${noun}: ${path}\n${BANNER}\n`;
  output += [
    "Char".padEnd(10),
    (kind === AlphabetKind.BYTE ? "Hex" : "Class").padEnd(10),
    "Count".padEnd(10),
    "Percent".padEnd(10),
    "Bar",
  ].join(" ");
  output += `\n${THIN_RULE}\n`;

  for (const { symbol, count } of ranked.slice(0, topN)) {
    const printable =
      kind === AlphabetKind.BYTE && symbol >= 0x20 && symbol <= 0x7e;
    const glyph = printable ? `'${String.fromCharCode(symbol)}'` : "";
    const percent = ((count / total) * 100).toFixed(2).padStart(6);

    output += [
      glyph.padEnd(10),
      symbolLabel(kind, symbol).padEnd(10),
      String(count).padEnd(10),
      `${percent}%`,
    ].join(" ");
    output += `  ${bar(count, maxCount, FREQUENCY_BAR_WIDTH)}\n`;
  }

  output += THIN_RULE + "\n";
  return output;
}

export function renderWindowGraph(windows: WindowEntropy[]): string {
  if (windows.length === 0) return "";

  let min = Infinity;
  let max = -Infinity;
  for (const { entropy } of windows) {
    if (entropy < min) min = entropy;
    if (entropy > max) max = entropy;
  }
  const range = max - min;

  if (range <= 0) {
    return `Entropy Graph (constant value: ${min.toFixed(6)})\n${THIN_RULE}\n`;
  }

  const step = Math.max(1, Math.floor(windows.length / HISTOGRAM_WIDTH));
  const sampled = windows.filter((_, i) => i % step === 0);
  const rowOf = (entropy: number) =>
    Math.min(GRAPH_HEIGHT - 1, Math.floor(((entropy - min) / range) * GRAPH_HEIGHT));

  let output = "Sliding Window Entropy Graph\n" + BANNER + "\n";
  output += `Min: ${min.toFixed(6)} bits, Max: ${max.toFixed(6)} bits, Range: ${range.toFixed(6)} bits\n`;
  output += THIN_RULE + "\n";

  for (let row = GRAPH_HEIGHT - 1; row >= 0; row--) {
    const upper = min + (range * (row + 1)) / GRAPH_HEIGHT;
    const axis =
      row % 5 === 0 || row === GRAPH_HEIGHT - 1
        ? `${upper.toFixed(2).padStart(6)} │`
        : "       │";
    const cells = sampled
      .map((w) => (rowOf(w.entropy) === row ? "█" : " "))
      .join("");
    output += (axis + cells).trimEnd() + "\n";
  }

  output += "       └" + "─".repeat(sampled.length) + "\n";
  const last = sampled[sampled.length - 1];
  if (last && sampled.length > 1) {
    output += "        0" + String(last.position).padStart(sampled.length - 1) + "\n";
  }
  output += THIN_RULE + "\n";
  return output;
}
