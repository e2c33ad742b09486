import path from "node:path";
import type { ExtensionPolicy } from "./types.js";

export const DEFAULT_TEXT_EXTENSIONS = [
  ".php", ".twig", ".html", ".htm", ".blade.php", ".js", ".ts", ".tsx", ".jsx",
  ".css", ".scss", ".sass", ".json", ".yml", ".yaml", ".xml", ".csv", ".tsv",
  ".sql", ".md", ".txt", ".env", ".ini", ".conf", ".toml", ".gitignore",
  ".gitattributes", ".editorconfig", ".sh", ".bash", ".zsh", ".ps1", ".bat",
  ".cmd",
] as const;

// Only included when listed as a whole, never through their last suffix.
const KNOWN_COMPOUND_EXTENSIONS = [".blade.php"] as const;

const HTML_EXTENSIONS = new Set([".html", ".htm"]);
const JS_EXTENSIONS = new Set([".js", ".jsx"]);
const TS_EXTENSIONS = new Set([".ts", ".tsx"]);
const SCSS_EXTENSIONS = new Set([".scss", ".sass"]);
const YAML_EXTENSIONS = new Set([".yml", ".yaml"]);
const SHELL_EXTENSIONS = new Set([".sh", ".bash", ".zsh"]);

export function parseExtensions(tokens: readonly string[]): string[] {
  const extensions: string[] = [];
  for (const raw of tokens) {
    const token = raw.trim();
    if (!token) {
      continue;
    }
    const withDot = token.startsWith(".") ? token : `.${token}`;
    extensions.push(withDot.toLowerCase());
  }
  return Array.from(new Set(extensions));
}

export function extensionPolicy(
  extensions: readonly string[] = DEFAULT_TEXT_EXTENSIONS,
): ExtensionPolicy {
  return { kind: "extensions", extensions: parseExtensions(extensions) };
}

export function matchesExtensions(
  fileName: string,
  extensions: readonly string[],
): boolean {
  const lowerName = fileName.toLowerCase();
  const compounds = new Set<string>(KNOWN_COMPOUND_EXTENSIONS);
  for (const ext of extensions) {
    if (ext.indexOf(".", 1) !== -1) {
      compounds.add(ext);
    }
  }

  for (const compound of compounds) {
    if (lowerName.endsWith(compound) && lowerName !== compound) {
      return extensions.includes(compound);
    }
  }

  const ext = path.extname(lowerName);
  if (ext) {
    return extensions.includes(ext);
  }

  // Dot-files such as .env have no suffix of their own.
  return lowerName.startsWith(".") && extensions.includes(lowerName);
}

export function languageFromPath(filePath: string): string {
  const lowerName = path.basename(filePath).toLowerCase();
  const ext = path.extname(lowerName);

  if (lowerName.endsWith(".blade.php") || ext === ".php") {
    return "php";
  }
  if (ext === ".twig") {
    return "twig";
  }
  if (HTML_EXTENSIONS.has(ext)) {
    return "html";
  }
  if (JS_EXTENSIONS.has(ext)) {
    return "javascript";
  }
  if (TS_EXTENSIONS.has(ext)) {
    return "typescript";
  }
  if (ext === ".css") {
    return "css";
  }
  if (SCSS_EXTENSIONS.has(ext)) {
    return "scss";
  }
  if (YAML_EXTENSIONS.has(ext)) {
    return "yaml";
  }
  if (ext === ".md") {
    return "markdown";
  }
  if (ext === ".json") {
    return "json";
  }
  if (ext === ".sql") {
    return "sql";
  }
  if (ext === ".xml") {
    return "xml";
  }
  if (ext === ".ps1") {
    return "powershell";
  }
  if (SHELL_EXTENSIONS.has(ext)) {
    return "bash";
  }
  return "";
}
