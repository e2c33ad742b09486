import { describe, expect, it } from "vitest";
import {
  directoryLabel,
  normalizeNewlines,
  renderFileSection,
  renderFooter,
  renderHeader,
  renderStructureBlock,
} from "../../src/output/document-renderer.js";

describe("document renderer", () => {
  it("renders the header block", () => {
    expect(
      renderHeader({ targetDir: "/work/app/src", outputPath: "/work/app/src_dump.md" }),
    ).toBe("ディレクトリ:src\n対象:/work/app/src\n出力:/work/app/src_dump.md\n\n");
  });

  it("wraps structure lines and closes with a separator", () => {
    expect(renderStructureBlock(["app/", "  a.ts"])).toBe(
      "構造:\napp/\n  a.ts\n\n---\n\n",
    );
  });

  it("fences markdown sections with the file language", () => {
    expect(
      renderFileSection(
        { relativePath: "src/main.ts", content: "const a = 1;" },
        "md",
      ),
    ).toBe(
      "ファイル名:main.ts\nパス:src/\n内容\n```typescript\nconst a = 1;\n```\n\n---\n\n",
    );
  });

  it("leaves the fence language empty when unknown", () => {
    expect(
      renderFileSection({ relativePath: "notes.txt", content: "hi\n" }, "md"),
    ).toBe("ファイル名:notes.txt\nパス:/\n内容\n```\nhi\n```\n\n---\n\n");
  });

  it("writes plain text sections without fences", () => {
    expect(
      renderFileSection({ relativePath: "a/b/c.php", content: "x\r\ny\r\n" }, "txt"),
    ).toBe("ファイル名:c.php\nパス:a/b/\n内容\nx\ny\n\n---\n\n");
  });

  it("reports counters and the collection mode", () => {
    expect(
      renderFooter({
        written: 3,
        skippedBinary: 1,
        skippedLarge: 0,
        sizeCapped: false,
        strategy: "walk",
        allText: true,
      }),
    ).toBe(
      "出力ファイル数: 3\nスキップ（バイナリ判定）: 1\n収集方式: filesystem walk\nモード: all-text\n",
    );
    expect(
      renderFooter({
        written: 0,
        skippedBinary: 0,
        skippedLarge: 2,
        sizeCapped: true,
        strategy: "git",
        allText: false,
      }),
    ).toBe(
      "出力ファイル数: 0\nスキップ（バイナリ判定）: 0\nスキップ（max-bytes超過）: 2\n収集方式: git ls-files\nモード: ext-filter\n",
    );
  });

  it("labels directories with a trailing slash", () => {
    expect(directoryLabel("README.md")).toBe("/");
    expect(directoryLabel("app/Http/Kernel.php")).toBe("app/Http/");
  });

  it("normalizes carriage returns", () => {
    expect(normalizeNewlines("a\r\nb\rc\n")).toBe("a\nb\nc\n");
  });
});
