import { AlphabetKind } from "../analyzer/symbols";
import { OUTPUT_FORMATS, type OutputFormat } from "../report/formatter";

export interface CliOptions {
  command: "analyze" | "window" | "compare";
  input: string[];
  alphabet: AlphabetKind;
  format: OutputFormat;
  recursive: boolean;
  extension?: string;
  windowSize?: number;
  graph: boolean;
  compareWith?: string;
  histogram: boolean;
  frequency: boolean;
  top: number;
  progress: boolean;
  help: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export class CliParser {
  static parse(args: string[]): CliOptions {
    const options: CliOptions = {
      command: "analyze",
      input: [],
      alphabet: AlphabetKind.BYTE,
      format: "text",
      recursive: false,
      graph: false,
      histogram: false,
      frequency: false,
      top: 10,
      progress: true,
      help: false,
    };

    const valueOf = (i: number, arg: string): string => {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`Option ${arg} requires a value`);
      }
      return value;
    };

    let operandsOnly = false;
    for (let i = 0; i < args.length; i++) {
      const arg = args[i]!;
      if (operandsOnly || !arg.startsWith("-") || arg === "-") {
        options.input.push(arg);
      } else if (arg === "--") {
        operandsOnly = true;
      } else if (arg === "-b" || arg === "--bit") {
        options.alphabet = AlphabetKind.BIT_POPULATION;
      } else if (arg === "-f" || arg === "--format") {
        const format = valueOf(i++, arg);
        if (!isOutputFormat(format)) {
          throw new Error(
            `Invalid format: ${format}. Use: ${OUTPUT_FORMATS.join(", ")}`
          );
        }
        options.format = format;
      } else if (arg === "-r" || arg === "--recursive") {
        options.recursive = true;
      } else if (arg === "-e" || arg === "--extension") {
        options.extension = valueOf(i++, arg);
      } else if (arg === "-w" || arg === "--window") {
        options.windowSize = this.parsePositiveInt(valueOf(i++, arg), "window size");
      } else if (arg === "--graph") {
        options.graph = true;
      } else if (arg === "--compare") {
        options.compareWith = valueOf(i++, arg);
      } else if (arg === "--histogram") {
        options.histogram = true;
      } else if (arg === "--frequency") {
        options.frequency = true;
      } else if (arg === "--top") {
        options.top = this.parsePositiveInt(valueOf(i++, arg), "top count");
      } else if (arg === "--no-progress") {
        options.progress = false;
      } else if (arg === "-h" || arg === "--help") {
        options.help = true;
        return options;
      } else {
        throw new Error(`Unknown option: ${arg}`);
      }
    }

    if (options.compareWith !== undefined) {
      options.command = "compare";
      if (options.input.length !== 1) {
        throw new Error("--compare requires exactly one file operand");
      }
    } else if (options.windowSize !== undefined) {
      options.command = "window";
    }

    if (options.input.length === 0) {
      throw new Error("No input files specified");
    }

    return options;
  }

  private static parsePositiveInt(value: string, what: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
      throw new Error(`Invalid ${what}: ${value}. Must be a positive integer.`);
    }
    return parsed;
  }

  static usage(): string {
    return "Usage: byte-entropy [options] <files...>";
  }

  static printHelp(): void {
    console.log(`
Byte Entropy Calculator

${this.usage()}

Computes the Shannon entropy of each file, either over byte values
(256 symbols) or over the number of set bits per byte (9 symbols).

Analysis Options:
  -b, --bit                 Bit-population entropy instead of byte entropy
  -r, --recursive           Analyze directories recursively
  -e, --extension <ext>     Only analyze files with this extension
  -w, --window <size>       Entropy per window of <size> bytes (first file)
  --graph                   Draw the window entropies as a graph
  --compare <file2>         Compare <file2> against the single file operand

Output Options:
  -f, --format <fmt>        Output format: text, json, csv (default: text)
  --histogram               Show the symbol distribution histogram
  --frequency               Show the most frequent symbols
  --top <n>                 Symbols in the frequency chart (default: 10)
  --no-progress             Hide the progress line for multiple files
  -h, --help                Show this help message

Examples:
  byte-entropy file.bin                      Byte entropy of one file
  byte-entropy -b a.bin b.bin                Bit-population entropy
  byte-entropy -r -e .bin --format csv dir/  CSV report for a directory
  byte-entropy -w 4096 --graph image.iso     Entropy per 4 KiB window
  byte-entropy --compare new.bin old.bin     Compare two files
`);
  }
}
