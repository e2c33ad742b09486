import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_BINARY_SETTINGS,
  classifyFile,
  decodeText,
  isBinaryMimeType,
  sniffBinary,
} from "../../src/ingest/binary-classifier.js";
import {
  languageFromPath,
  matchesExtensions,
  parseExtensions,
} from "../../src/ingest/file-classifier.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "dirdump-classify-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("binary classifier", () => {
  it("returns the decoded content of text files", async () => {
    const filePath = path.join(tempDir, "hello.txt");
    await fs.writeFile(filePath, "héllo\n", "utf8");

    expect(await classifyFile(filePath)).toEqual({
      kind: "text",
      content: "héllo\n",
    });
  });

  it("rejects blacklisted extensions without reading", async () => {
    expect(await classifyFile(path.join(tempDir, "missing.PNG"))).toEqual({
      kind: "binary",
      reason: "extension",
    });
    expect(await classifyFile(path.join(tempDir, "dump.sql"))).toEqual({
      kind: "binary",
      reason: "extension",
    });
  });

  it("honours a configured blacklist", async () => {
    const filePath = path.join(tempDir, "schema.sql");
    await fs.writeFile(filePath, "select 1;\n", "utf8");

    const result = await classifyFile(filePath, {
      ...DEFAULT_BINARY_SETTINGS,
      extensions: new Set([".bin"]),
    });
    expect(result).toEqual({ kind: "text", content: "select 1;\n" });
  });

  it("uses the MIME type guessed from the name", async () => {
    expect(isBinaryMimeType("logo.svg")).toBe(true);
    expect(isBinaryMimeType("manual.pdf")).toBe(true);
    expect(isBinaryMimeType("index.html")).toBe(false);
    expect(isBinaryMimeType("main.ts")).toBe(false);
    expect(await classifyFile(path.join(tempDir, "logo.svg"))).toEqual({
      kind: "binary",
      reason: "mime-type",
    });
  });

  it("treats unreadable files as binary", async () => {
    expect(await classifyFile(path.join(tempDir, "gone.txt"))).toEqual({
      kind: "binary",
      reason: "unreadable",
    });
  });

  it("detects NUL bytes", async () => {
    const filePath = path.join(tempDir, "data.txt");
    await fs.writeFile(filePath, Buffer.from([0x61, 0x00, 0x62]));

    expect(await classifyFile(filePath)).toEqual({
      kind: "binary",
      reason: "nul-byte",
    });
  });

  it("flags samples dominated by high bytes", () => {
    const settings = { minSampleBytes: 512, highByteRatio: 0.3 };
    const dense = Buffer.concat([
      Buffer.alloc(400, 0x61),
      Buffer.alloc(200, 0xe3),
    ]);
    const sparse = Buffer.concat([
      Buffer.alloc(450, 0x61),
      Buffer.alloc(150, 0xe3),
    ]);

    expect(sniffBinary(dense, settings)).toBe("high-byte-ratio");
    expect(sniffBinary(sparse, settings)).toBeNull();
  });

  it("ignores the ratio for short samples", () => {
    const short = Buffer.alloc(511, 0xff);
    expect(
      sniffBinary(short, { minSampleBytes: 512, highByteRatio: 0.3 }),
    ).toBeNull();
    expect(
      sniffBinary(short, { minSampleBytes: 256, highByteRatio: 0.3 }),
    ).toBe("high-byte-ratio");
  });
});

describe("text decoding", () => {
  it("prefers UTF-8 and keeps a byte order mark", () => {
    expect(decodeText(Buffer.from("plain", "utf8"))).toBe("plain");
    expect(decodeText(Buffer.from([0xef, 0xbb, 0xbf, 0x61]))).toBe("\ufeffa");
  });

  it("falls back to Shift_JIS", () => {
    expect(decodeText(Buffer.from([0x82, 0xa0, 0x41]))).toBe("あA");
  });

  it("replaces bytes no codec accepts", () => {
    expect(decodeText(Buffer.from([0x61, 0xff]))).toBe("a\ufffd");
  });
});

describe("extension policy", () => {
  it("normalizes extension tokens", () => {
    expect(parseExtensions(["PHP", ".Twig", "php", " ", "blade.php"])).toEqual(
      [".php", ".twig", ".blade.php"],
    );
  });

  it("matches the last suffix case-insensitively", () => {
    expect(matchesExtensions("Index.PHP", [".php"])).toBe(true);
    expect(matchesExtensions("README", [".md"])).toBe(false);
    expect(matchesExtensions("notes.md.bak", [".md"])).toBe(false);
  });

  it("checks compound suffixes against the whole name", () => {
    expect(matchesExtensions("welcome.blade.php", [".php"])).toBe(false);
    expect(matchesExtensions("welcome.blade.php", [".blade.php"])).toBe(true);
    expect(matchesExtensions("types.d.ts", [".d.ts"])).toBe(true);
    expect(matchesExtensions("types.d.ts", [".ts"])).toBe(true);
  });

  it("matches dot-files by name", () => {
    expect(matchesExtensions(".env", [".env"])).toBe(true);
    expect(matchesExtensions(".gitignore", [".env"])).toBe(false);
  });

  it("derives fence languages", () => {
    expect(languageFromPath("views/home.blade.php")).toBe("php");
    expect(languageFromPath("src/App.TSX")).toBe("typescript");
    expect(languageFromPath("style.sass")).toBe("scss");
    expect(languageFromPath("deploy.zsh")).toBe("bash");
    expect(languageFromPath("setup.ps1")).toBe("powershell");
    expect(languageFromPath("notes.txt")).toBe("");
  });
});
