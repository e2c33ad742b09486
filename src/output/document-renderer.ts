import path from "node:path";
import { languageFromPath } from "../ingest/file-classifier.js";
import type { CollectionStrategy } from "../ingest/types.js";

export type OutputFormat = "md" | "txt";

export const SEPARATOR = "---";

const FENCE = "```";

export interface HeaderInfo {
  readonly targetDir: string;
  readonly outputPath: string;
}

export interface FileSection {
  readonly relativePath: string;
  readonly content: string;
}

export interface DumpCounters {
  readonly written: number;
  readonly skippedBinary: number;
  readonly skippedLarge: number;
}

export interface FooterInfo extends DumpCounters {
  readonly sizeCapped: boolean;
  readonly strategy: CollectionStrategy;
  readonly allText: boolean;
}

export function renderHeader(info: HeaderInfo): string {
  return [
    `ディレクトリ:${path.basename(info.targetDir)}`,
    `対象:${toForwardSlashes(info.targetDir)}`,
    `出力:${toForwardSlashes(info.outputPath)}`,
    "",
    "",
  ].join("\n");
}

export function renderStructureBlock(lines: readonly string[]): string {
  return ["構造:", ...lines, "", SEPARATOR, "", ""].join("\n");
}

export function renderFileSection(
  section: FileSection,
  format: OutputFormat,
): string {
  const content = ensureTrailingNewline(normalizeNewlines(section.content));
  const lines = [
    `ファイル名:${path.posix.basename(section.relativePath)}`,
    `パス:${directoryLabel(section.relativePath)}`,
    "内容",
  ];
  const head = lines.join("\n") + "\n";

  if (format === "md") {
    const language = languageFromPath(section.relativePath);
    return `${head}${FENCE}${language}\n${content}${FENCE}\n\n${SEPARATOR}\n\n`;
  }
  return `${head}${content}\n${SEPARATOR}\n\n`;
}

export function renderFooter(info: FooterInfo): string {
  const lines = [
    `出力ファイル数: ${info.written}`,
    `スキップ（バイナリ判定）: ${info.skippedBinary}`,
  ];
  if (info.sizeCapped) {
    lines.push(`スキップ（max-bytes超過）: ${info.skippedLarge}`);
  }
  lines.push(
    `収集方式: ${info.strategy === "git" ? "git ls-files" : "filesystem walk"}`,
  );
  lines.push(`モード: ${info.allText ? "all-text" : "ext-filter"}`);
  return lines.join("\n") + "\n";
}

export function directoryLabel(relativePath: string): string {
  const dir = path.posix.dirname(relativePath);
  return dir === "." ? "/" : `${dir}/`;
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

function ensureTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

function toForwardSlashes(filePath: string): string {
  return filePath.split(path.sep).join(path.posix.sep);
}
