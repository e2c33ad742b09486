import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { OutputWriteError } from "../errors.js";

export type SplitWriterState = "single" | "splitting" | "closed";

export const CONTINUATION_MARKER = "（続き）\n\n";

export interface SplitWriterOptions {
  /** 0 disables rotation. */
  readonly budgetBytes?: number;
  readonly continuationMarker?: string;
  readonly onRotate?: (partPath: string, partIndex: number) => void;
}

/**
 * True when appending `nextBytes` to a non-empty part would push it past
 * the budget. An empty part accepts any write, however large.
 */
export function wouldOverflow(
  currentBytes: number,
  nextBytes: number,
  budgetBytes: number,
): boolean {
  if (budgetBytes <= 0 || currentBytes <= 0) {
    return false;
  }
  return currentBytes + nextBytes > budgetBytes;
}

export function partPath(outputPath: string, index: number): string {
  const parsed = path.parse(outputPath);
  const padded = String(index).padStart(3, "0");
  return path.join(parsed.dir, `${parsed.name}_${padded}${parsed.ext}`);
}

export function partFilePattern(outputPath: string): RegExp {
  const parsed = path.parse(outputPath);
  return new RegExp(
    `^${escapeRegex(parsed.name)}_\\d{3}${escapeRegex(parsed.ext)}$`,
  );
}

/**
 * True for the output file itself and for any part file named after it, so a
 * dump never includes pieces of an earlier dump.
 */
export function isOwnOutput(filePath: string, outputPath: string): boolean {
  const resolved = path.resolve(filePath);
  const resolvedOutput = path.resolve(outputPath);
  if (resolved === resolvedOutput) {
    return true;
  }
  return partFilePattern(resolvedOutput).test(path.basename(resolved));
}

export class SplitWriter {
  private handle: FileHandle | null;
  private partBytes = 0;
  private partIndex = 1;
  private currentState: SplitWriterState = "single";
  private readonly emitted: string[];

  private constructor(
    readonly outputPath: string,
    private readonly options: SplitWriterOptions,
    handle: FileHandle,
  ) {
    this.handle = handle;
    this.emitted = [outputPath];
  }

  static async open(
    outputPath: string,
    options: SplitWriterOptions = {},
  ): Promise<SplitWriter> {
    const resolved = path.resolve(outputPath);
    try {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
    } catch (error) {
      throw new OutputWriteError(
        `Unable to create output directory: ${path.dirname(resolved)}`,
        resolved,
        { cause: error },
      );
    }
    await removeStaleParts(resolved);
    const handle = await openForWrite(resolved);
    return new SplitWriter(resolved, options, handle);
  }

  get state(): SplitWriterState {
    return this.currentState;
  }

  /** Paths of every physical part, in the order they were produced. */
  get parts(): readonly string[] {
    return [...this.emitted];
  }

  get currentPartBytes(): number {
    return this.partBytes;
  }

  async write(text: string): Promise<void> {
    if (this.currentState === "closed" || !this.handle) {
      throw new OutputWriteError(
        "Cannot write to a closed output",
        this.outputPath,
      );
    }

    const bytes = Buffer.from(text, "utf8");
    if (wouldOverflow(this.partBytes, bytes.length, this.budget())) {
      await this.rotate();
    }
    await this.writeBytes(bytes);
  }

  async close(): Promise<void> {
    if (this.currentState === "closed") {
      return;
    }
    const handle = this.handle;
    this.handle = null;
    this.currentState = "closed";
    await handle?.close();
  }

  private budget(): number {
    return this.options.budgetBytes ?? 0;
  }

  private async rotate(): Promise<void> {
    await this.handle?.close();
    this.handle = null;

    if (this.currentState === "single") {
      const firstPart = partPath(this.outputPath, 1);
      try {
        await fs.rename(this.outputPath, firstPart);
      } catch (error) {
        throw new OutputWriteError(
          `Unable to rename output to ${firstPart}`,
          this.outputPath,
          { cause: error },
        );
      }
      this.emitted.splice(0, this.emitted.length, firstPart);
      this.currentState = "splitting";
    }

    this.partIndex += 1;
    const nextPart = partPath(this.outputPath, this.partIndex);
    this.handle = await openForWrite(nextPart);
    this.partBytes = 0;
    this.emitted.push(nextPart);
    this.options.onRotate?.(nextPart, this.partIndex);

    const marker = this.options.continuationMarker ?? CONTINUATION_MARKER;
    if (marker) {
      await this.writeBytes(Buffer.from(marker, "utf8"));
    }
  }

  private async writeBytes(bytes: Buffer): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      throw new OutputWriteError("Output is not open", this.outputPath);
    }
    let offset = 0;
    try {
      while (offset < bytes.length) {
        const { bytesWritten } = await handle.write(
          bytes,
          offset,
          bytes.length - offset,
        );
        offset += bytesWritten;
      }
    } catch (error) {
      throw new OutputWriteError(
        `Unable to write output: ${this.emitted[this.emitted.length - 1] ?? this.outputPath}`,
        this.outputPath,
        { cause: error },
      );
    }
    this.partBytes += bytes.length;
  }
}

// Parts of an earlier run would otherwise sit beside the new output.
async function removeStaleParts(outputPath: string): Promise<void> {
  const dir = path.dirname(outputPath);
  const pattern = partFilePattern(outputPath);
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    throw new OutputWriteError(
      `Unable to list output directory: ${dir}`,
      outputPath,
      { cause: error },
    );
  }

  for (const name of names.filter((entry) => pattern.test(entry))) {
    const stalePath = path.join(dir, name);
    try {
      await fs.rm(stalePath, { force: true });
    } catch (error) {
      throw new OutputWriteError(
        `Unable to remove previous part: ${stalePath}`,
        outputPath,
        { cause: error },
      );
    }
  }
}

async function openForWrite(filePath: string): Promise<FileHandle> {
  try {
    return await fs.open(filePath, "w");
  } catch (error) {
    throw new OutputWriteError(
      `Unable to open output file: ${filePath}`,
      filePath,
      { cause: error },
    );
  }
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
