import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OutputWriteError } from "../../src/errors.js";
import {
  CONTINUATION_MARKER,
  SplitWriter,
  isOwnOutput,
  partFilePattern,
  partPath,
  wouldOverflow,
} from "../../src/output/split-writer.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "dirdump-split-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("wouldOverflow", () => {
  it("allows writes that land exactly on the budget", () => {
    expect(wouldOverflow(60, 40, 100)).toBe(false);
    expect(wouldOverflow(61, 40, 100)).toBe(true);
  });

  it("never rotates an empty part or an unlimited budget", () => {
    expect(wouldOverflow(0, 500, 100)).toBe(false);
    expect(wouldOverflow(90, 500, 0)).toBe(false);
  });
});

describe("part naming", () => {
  it("numbers parts with three digits before the extension", () => {
    expect(partPath("/out/dump.md", 1)).toBe(path.join("/out", "dump_001.md"));
    expect(partPath("/out/dump.md", 12)).toBe(path.join("/out", "dump_012.md"));
    expect(partPath("/out/dump", 2)).toBe(path.join("/out", "dump_002"));
  });

  it("recognizes part names of the same output only", () => {
    const pattern = partFilePattern("/out/app_dump.md");
    expect(pattern.test("app_dump_001.md")).toBe(true);
    expect(pattern.test("app_dump_01.md")).toBe(false);
    expect(pattern.test("app_dump_001.txt")).toBe(false);
    expect(pattern.test("appXdump_001.md")).toBe(false);
  });

  it("treats the output and its parts as its own files", () => {
    const output = path.join(tempDir, "project_dump.md");
    expect(isOwnOutput(output, output)).toBe(true);
    expect(isOwnOutput(path.join(tempDir, "sub", "project_dump_003.md"), output)).toBe(
      true,
    );
    expect(isOwnOutput(path.join(tempDir, "project.md"), output)).toBe(false);
  });
});

describe("SplitWriter", () => {
  it("keeps a single file while under budget", async () => {
    const output = path.join(tempDir, "nested", "dump.md");
    const writer = await SplitWriter.open(output, { budgetBytes: 100 });
    await writer.write("a".repeat(40));
    await writer.write("b".repeat(40));
    await writer.close();

    expect(writer.state).toBe("closed");
    expect(writer.parts).toEqual([output]);
    expect(await fs.readFile(output, "utf8")).toBe(
      "a".repeat(40) + "b".repeat(40),
    );
  });

  it("rotates into numbered parts when a write would overflow", async () => {
    const output = path.join(tempDir, "dump.md");
    const onRotate = vi.fn();
    const writer = await SplitWriter.open(output, {
      budgetBytes: 100,
      onRotate,
    });
    await writer.write("a".repeat(40));
    await writer.write("b".repeat(40));
    expect(writer.state).toBe("single");
    await writer.write("c".repeat(40));
    expect(writer.state).toBe("splitting");
    await writer.close();

    const first = path.join(tempDir, "dump_001.md");
    const second = path.join(tempDir, "dump_002.md");
    expect(writer.parts).toEqual([first, second]);
    expect(await fs.readFile(first, "utf8")).toBe(
      "a".repeat(40) + "b".repeat(40),
    );
    expect(await fs.readFile(second, "utf8")).toBe(
      CONTINUATION_MARKER + "c".repeat(40),
    );
    await expect(fs.access(output)).rejects.toThrow();
    expect(onRotate).toHaveBeenCalledTimes(1);
    expect(onRotate).toHaveBeenCalledWith(second, 2);
  });

  it("counts the continuation marker toward the new part", async () => {
    const writer = await SplitWriter.open(path.join(tempDir, "dump.txt"), {
      budgetBytes: 20,
      continuationMarker: "...\n",
    });
    await writer.write("x".repeat(15));
    await writer.write("y".repeat(10));
    expect(writer.currentPartBytes).toBe(14);
    await writer.write("z".repeat(10));
    await writer.close();

    expect(writer.parts.map((part) => path.basename(part))).toEqual([
      "dump_001.txt",
      "dump_002.txt",
      "dump_003.txt",
    ]);
    expect(
      await fs.readFile(path.join(tempDir, "dump_003.txt"), "utf8"),
    ).toBe("...\n" + "z".repeat(10));
  });

  it("writes an oversized chunk whole into an empty part", async () => {
    const output = path.join(tempDir, "dump.md");
    const writer = await SplitWriter.open(output, { budgetBytes: 10 });
    await writer.write("x".repeat(25));
    await writer.close();

    expect(writer.parts).toEqual([output]);
    expect((await fs.stat(output)).size).toBe(25);
  });

  it("measures the budget in UTF-8 bytes", async () => {
    const writer = await SplitWriter.open(path.join(tempDir, "dump.md"), {
      budgetBytes: 8,
    });
    await writer.write("ab");
    await writer.write("あいう");
    await writer.close();

    expect(writer.parts).toHaveLength(2);
  });

  it("removes parts left by an earlier run", async () => {
    for (const name of ["dump_001.md", "dump_003.md", "dump_01.md", "other_001.md"]) {
      await fs.writeFile(path.join(tempDir, name), "old\n", "utf8");
    }

    const writer = await SplitWriter.open(path.join(tempDir, "dump.md"));
    await writer.write("new\n");
    await writer.close();

    expect((await fs.readdir(tempDir)).sort()).toEqual([
      "dump.md",
      "dump_01.md",
      "other_001.md",
    ]);
  });

  it("rejects writes after close and closes only once", async () => {
    const writer = await SplitWriter.open(path.join(tempDir, "dump.md"));
    await writer.close();
    await writer.close();

    await expect(writer.write("late")).rejects.toBeInstanceOf(OutputWriteError);
  });
});
