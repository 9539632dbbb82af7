/** The part of a terminal stream the tracker writes to. */
export interface ProgressStream {
  isTTY?: boolean;
  write(text: string): unknown;
}

export class ProgressTracker {
  private processed = 0;
  private readonly total: number;
  private readonly startTime: number;
  private readonly stream: ProgressStream;
  private readonly enabled: boolean;

  constructor(total: number, enabled: boolean, stream: ProgressStream = process.stderr) {
    this.total = total;
    this.startTime = Date.now();
    this.stream = stream;
    this.enabled = enabled && total > 1 && stream.isTTY === true;
  }

  /** Announces the next item as `[i/n] label`. */
  tick(label: string): void {
    this.processed++;
    if (this.enabled) {
      this.stream.write(`\r\x1b[K[${this.processed}/${this.total}] ${label}`);
    }
  }

  clear(): void {
    if (this.enabled) {
      this.stream.write("\r\x1b[K");
    }
  }

  finish(): void {
    if (this.enabled) {
      const elapsed = (Date.now() - this.startTime) / 1000;
      this.stream.write(`\r\x1b[K${this.total} files analyzed in ${elapsed.toFixed(2)}s\n`);
    }
  }
}
