import { describe, it, expect } from "vitest";
import {
  renderDistribution,
  renderFrequencyChart,
  renderWindowGraph,
} from "../src/report/charts";
import { BIT_POPULATION_ALPHABET } from "../src/analyzer/symbols";
import { analysisOf } from "./helpers";

const BANNER = "=".repeat(70);
const THIN_RULE = "─".repeat(70);
const block = (n: number) => "█".repeat(n);

describe("renderDistribution", () => {
  it("bins byte values sixteen at a time", () => {
    const lines = renderDistribution(analysisOf("x.bin", [0x00, 0x01, 0x41])).split("\n");
    expect(lines[0]).toBe("Byte Distribution Histogram: x.bin");
    expect(lines[1]).toBe(BANNER);
    expect(lines[2]).toBe(`00-0F │${block(60)}│ 2`);
    expect(lines[3]).toBe("10-1F ││ 0");
    expect(lines[6]).toBe(`40-4F │${block(30)}│ 1`);
    expect(lines[17]).toBe("F0-FF ││ 0");
    expect(lines[18]).toBe(BANNER);
    expect(lines).toHaveLength(20);
  });

  it("shows one row per set-bit class", () => {
    const lines = renderDistribution(
      analysisOf("y.bin", [0x00, 0xff, 0xff], BIT_POPULATION_ALPHABET)
    ).split("\n");
    expect(lines[0]).toBe("Bit-Population Distribution Histogram: y.bin");
    expect(lines[2]).toBe(`0 bits │${block(30)}│ 1`);
    expect(lines[3]).toBe("1 bits ││ 0");
    expect(lines[10]).toBe(`8 bits │${block(60)}│ 2`);
  });

  it("draws no bars for an empty file", () => {
    const lines = renderDistribution(analysisOf("e.bin", [])).split("\n");
    expect(lines[2]).toBe("00-0F ││ 0");
  });
});

describe("renderFrequencyChart", () => {
  it("lists the most frequent bytes with glyphs and percentages", () => {
    const lines = renderFrequencyChart(analysisOf("t.txt", [0x41, 0x41, 0x42]), 10).split("\n");
    expect(lines).toEqual([
      "Top 10 Most Frequent Bytes: t.txt",
      BANNER,
      "Char       Hex        Count      Percent    Bar",
      THIN_RULE,
      `'A'        0x41       2           66.67%  ${block(30)}`,
      `'B'        0x42       1           33.33%  ${block(15)}`,
      THIN_RULE,
      "",
    ]);
  });

  it("limits the chart to the requested count and omits unprintable glyphs", () => {
    const lines = renderFrequencyChart(analysisOf("u.bin", [0x00, 0x00, 0x41]), 1).split("\n");
    expect(lines[4]).toBe(`           0x00       2           66.67%  ${block(30)}`);
    expect(lines[5]).toBe(THIN_RULE);
  });

  it("labels bit-population classes", () => {
    const lines = renderFrequencyChart(
      analysisOf("v.bin", [0x0f, 0xf0, 0x01, 0x02], BIT_POPULATION_ALPHABET),
      5
    ).split("\n");
    expect(lines[0]).toBe("Top 5 Most Frequent Bit-Population Classes: v.bin");
    expect(lines[2]).toBe("Char       Class      Count      Percent    Bar");
    expect(lines[4]).toBe(`           1 bits     2           50.00%  ${block(30)}`);
    expect(lines[5]).toBe(`           4 bits     2           50.00%  ${block(30)}`);
  });
});

describe("renderWindowGraph", () => {
  it("renders nothing without windows", () => {
    expect(renderWindowGraph([])).toBe("");
  });

  it("collapses constant entropy to one line", () => {
    expect(
      renderWindowGraph([
        { position: 0, size: 4, entropy: 1 },
        { position: 4, size: 4, entropy: 1 },
      ])
    ).toBe(`Entropy Graph (constant value: 1.000000)\n${THIN_RULE}\n`);
  });

  it("plots each window in the row of its entropy", () => {
    const lines = renderWindowGraph([
      { position: 0, size: 4, entropy: 0 },
      { position: 4, size: 4, entropy: 1 },
    ]).split("\n");
    expect(lines[0]).toBe("Sliding Window Entropy Graph");
    expect(lines[2]).toBe("Min: 0.000000 bits, Max: 1.000000 bits, Range: 1.000000 bits");
    expect(lines[4]).toBe("  1.00 │ █");
    expect(lines[5]).toBe("       │");
    expect(lines[23]).toBe("  0.05 │█");
    expect(lines[24]).toBe("       └──");
  });

  it("handles a million windows", () => {
    const windows = Array.from({ length: 1_000_000 }, (_, i) => ({
      position: i * 16,
      size: 16,
      entropy: i === 500_000 ? 4 : (i % 2) * 2,
    }));
    const lines = renderWindowGraph(windows).split("\n");
    expect(lines[2]).toBe("Min: 0.000000 bits, Max: 4.000000 bits, Range: 4.000000 bits");
    expect(lines[24]).toBe("       └" + "─".repeat(61));
  });
});
