import type { Dirent, Stats } from "fs";
import { open, readdir, stat, type FileHandle } from "fs/promises";
import { extname, join } from "path";

export const READ_CHUNK_SIZE = 64 * 1024;

export interface CollectOptions {
  recursive?: boolean;
  extension?: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Yields views into one reused buffer; consume each chunk before the next. */
export async function* readChunks(
  filePath: string,
  chunkSize: number = READ_CHUNK_SIZE
): AsyncGenerator<Uint8Array> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch (error) {
    throw new Error(`Error opening file ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  try {
    const buffer = new Uint8Array(chunkSize);
    while (true) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buffer, 0, chunkSize, null));
      } catch (error) {
        throw new Error(
          `Error reading file ${filePath}: ${describeError(error)}`,
          { cause: error }
        );
      }
      if (bytesRead === 0) break;
      yield buffer.subarray(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}

export function matchesExtension(filePath: string, extension?: string): boolean {
  if (!extension) return true;
  const wanted = extension.replace(/^\./, "");
  return extname(filePath).replace(/^\./, "") === wanted;
}

async function isLinkedFile(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (error) {
    console.warn(`Warning: Cannot follow link ${linkPath}: ${describeError(error)}`);
    return false;
  }
}

/** Links to files are included; linked directories are not descended into. */
async function getAllFiles(dirPath: string): Promise<string[]> {
  const files: string[] = [];
  let entries: Dirent[];
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    console.warn(`Warning: Cannot read directory ${dirPath}: ${describeError(error)}`);
    return files;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await getAllFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink() && (await isLinkedFile(fullPath))) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Expands operands into the list of files to analyze, in argument order.
 * Operands that cannot be stat'ed are kept so the caller reports them.
 */
export async function collectFiles(
  inputs: string[],
  options: CollectOptions = {}
): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    let stats: Stats;
    try {
      stats = await stat(input);
    } catch {
      files.push(input);
      continue;
    }

    if (stats.isDirectory()) {
      if (!options.recursive) {
        console.warn(
          `Warning: ${input} is a directory. Use -r/--recursive to analyze directories.`
        );
        continue;
      }
      const walked = await getAllFiles(input);
      files.push(...walked.filter((f) => matchesExtension(f, options.extension)));
    } else if (matchesExtension(input, options.extension)) {
      files.push(input);
    }
  }

  return files;
}
