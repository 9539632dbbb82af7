import { describe, it, expect } from "vitest";
import { CliParser } from "../src/cli/parser";
import { AlphabetKind } from "../src/analyzer/symbols";

describe("CliParser.parse", () => {
  it("applies defaults", () => {
    expect(CliParser.parse(["a.bin"])).toEqual({
      command: "analyze",
      input: ["a.bin"],
      alphabet: AlphabetKind.BYTE,
      format: "text",
      recursive: false,
      graph: false,
      histogram: false,
      frequency: false,
      top: 10,
      progress: true,
      help: false,
    });
  });

  it("selects the bit-population alphabet", () => {
    expect(CliParser.parse(["-b", "a.bin"]).alphabet).toBe(AlphabetKind.BIT_POPULATION);
    expect(CliParser.parse(["a.bin", "--bit"]).alphabet).toBe(AlphabetKind.BIT_POPULATION);
  });

  it("keeps operands in order around options", () => {
    const options = CliParser.parse(["one", "-r", "two", "-e", ".bin", "three"]);
    expect(options.input).toEqual(["one", "two", "three"]);
    expect(options.recursive).toBe(true);
    expect(options.extension).toBe(".bin");
  });

  it("treats everything after -- as operands", () => {
    expect(CliParser.parse(["--", "-b", "x"]).input).toEqual(["-b", "x"]);
  });

  it("parses output options", () => {
    const options = CliParser.parse([
      "-f", "csv", "--histogram", "--frequency", "--top", "3", "--no-progress", "a",
    ]);
    expect(options.format).toBe("csv");
    expect(options.histogram).toBe(true);
    expect(options.frequency).toBe(true);
    expect(options.top).toBe(3);
    expect(options.progress).toBe(false);
  });

  it("switches to window mode", () => {
    const options = CliParser.parse(["-w", "1024", "--graph", "big.bin"]);
    expect(options.command).toBe("window");
    expect(options.windowSize).toBe(1024);
    expect(options.graph).toBe(true);
  });

  it("switches to compare mode", () => {
    const options = CliParser.parse(["--compare", "new.bin", "old.bin"]);
    expect(options.command).toBe("compare");
    expect(options.compareWith).toBe("new.bin");
    expect(options.input).toEqual(["old.bin"]);
  });

  it("stops at --help", () => {
    const options = CliParser.parse(["--help", "--bogus"]);
    expect(options.help).toBe(true);
  });

  it("rejects a missing operand", () => {
    expect(() => CliParser.parse(["-b"])).toThrow("No input files specified");
  });

  it("rejects unknown options", () => {
    expect(() => CliParser.parse(["--fast", "a"])).toThrow("Unknown option: --fast");
  });

  it("rejects options without their value", () => {
    expect(() => CliParser.parse(["a", "--format"])).toThrow("Option --format requires a value");
  });

  it("rejects invalid values", () => {
    expect(() => CliParser.parse(["-f", "xml", "a"])).toThrow(
      "Invalid format: xml. Use: text, json, csv"
    );
    expect(() => CliParser.parse(["-w", "0", "a"])).toThrow(
      "Invalid window size: 0. Must be a positive integer."
    );
    expect(() => CliParser.parse(["--top", "2.5", "a"])).toThrow(
      "Invalid top count: 2.5. Must be a positive integer."
    );
  });

  it("requires exactly one operand with --compare", () => {
    expect(() => CliParser.parse(["--compare", "b", "a", "c"])).toThrow(
      "--compare requires exactly one file operand"
    );
    expect(() => CliParser.parse(["--compare", "b"])).toThrow(
      "--compare requires exactly one file operand"
    );
  });
});
