import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import mime from "mime-types";
import type { BinaryReason, BinarySettings, Classification } from "./types.js";

// SQL dumps and logs are generated data, not source.
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  ".png", ".jpg", ".jpeg", ".gif", ".webp", ".bmp", ".ico", ".tif", ".tiff", ".svgz",
  ".pdf",
  ".zip", ".7z", ".rar", ".tar", ".gz", ".bz2", ".xz",
  ".mp3", ".wav", ".flac", ".ogg",
  ".mp4", ".mov", ".avi", ".mkv", ".webm",
  ".exe", ".dll", ".so", ".dylib", ".bin", ".dat", ".class", ".jar",
  ".ttf", ".otf", ".woff", ".woff2",
  ".psd", ".ai", ".sketch",
  ".sql", ".log",
]);

const BINARY_MIME_PREFIXES = ["image/", "audio/", "video/"] as const;
const BINARY_MIME_EXACT = new Set(["application/pdf", "application/zip"]);

// The MIME database maps these to MPEG transport streams.
const MIME_TEXT_OVERRIDES = new Set([".ts", ".mts", ".cts", ".tsx"]);

export const DEFAULT_BINARY_SETTINGS: BinarySettings = {
  extensions: BINARY_EXTENSIONS,
  sniffBytes: 8192,
  minSampleBytes: 512,
  highByteRatio: 0.3,
};

interface DecoderSpec {
  readonly label: string;
  readonly ignoreBOM: boolean;
}

// UTF-8 keeping a BOM, UTF-8 stripping it, then Windows Japanese.
const DECODERS: readonly DecoderSpec[] = [
  { label: "utf-8", ignoreBOM: true },
  { label: "utf-8", ignoreBOM: false },
  { label: "shift_jis", ignoreBOM: false },
];

export async function classifyFile(
  filePath: string,
  settings: BinarySettings = DEFAULT_BINARY_SETTINGS,
): Promise<Classification> {
  if (isBinaryExtension(filePath, settings.extensions)) {
    return { kind: "binary", reason: "extension" };
  }

  if (isBinaryMimeType(filePath)) {
    return { kind: "binary", reason: "mime-type" };
  }

  const sample = await readSample(filePath, settings.sniffBytes);
  if (!sample) {
    return { kind: "binary", reason: "unreadable" };
  }

  const sniffed = sniffBinary(sample, settings);
  if (sniffed) {
    return { kind: "binary", reason: sniffed };
  }

  let raw: Buffer;
  try {
    raw = await fs.readFile(filePath);
  } catch {
    return { kind: "binary", reason: "unreadable" };
  }

  return { kind: "text", content: decodeText(raw) };
}

export function isBinaryExtension(
  filePath: string,
  extensions: ReadonlySet<string> = BINARY_EXTENSIONS,
): boolean {
  return extensions.has(path.extname(filePath).toLowerCase());
}

export function isBinaryMimeType(filePath: string): boolean {
  if (MIME_TEXT_OVERRIDES.has(path.extname(filePath).toLowerCase())) {
    return false;
  }

  const mimeType = mime.lookup(filePath);
  if (!mimeType) {
    return false;
  }

  if (BINARY_MIME_PREFIXES.some((prefix) => mimeType.startsWith(prefix))) {
    return true;
  }
  return BINARY_MIME_EXACT.has(mimeType);
}

export function sniffBinary(
  sample: Uint8Array,
  settings: Pick<BinarySettings, "minSampleBytes" | "highByteRatio">,
): BinaryReason | null {
  if (sample.includes(0)) {
    return "nul-byte";
  }

  if (sample.length < settings.minSampleBytes) {
    return null;
  }

  // Bytes >= 0x80 may belong to multi-byte text; only their density matters.
  let highBytes = 0;
  for (const byte of sample) {
    if (byte >= 0x80) {
      highBytes += 1;
    }
  }

  if (highBytes / sample.length > settings.highByteRatio) {
    return "high-byte-ratio";
  }
  return null;
}

export function decodeText(raw: Uint8Array): string {
  for (const spec of DECODERS) {
    const decoder = createDecoder(spec);
    if (!decoder) {
      continue;
    }
    try {
      return decoder.decode(raw);
    } catch {
      continue;
    }
  }

  return new TextDecoder("utf-8", { ignoreBOM: true }).decode(raw);
}

function createDecoder(spec: DecoderSpec): TextDecoder | null {
  try {
    return new TextDecoder(spec.label, {
      fatal: true,
      ignoreBOM: spec.ignoreBOM,
    });
  } catch {
    // Runtimes built without full ICU lack the legacy codecs.
    return null;
  }
}

async function readSample(
  filePath: string,
  sniffBytes: number,
): Promise<Uint8Array | null> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(filePath, "r");
    const buffer = Buffer.alloc(sniffBytes);
    const { bytesRead } = await handle.read(buffer, 0, sniffBytes, 0);
    return buffer.subarray(0, bytesRead);
  } catch {
    return null;
  } finally {
    await handle?.close();
  }
}
