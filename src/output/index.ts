export {
  SEPARATOR,
  directoryLabel,
  normalizeNewlines,
  renderFileSection,
  renderFooter,
  renderHeader,
  renderStructureBlock,
} from "./document-renderer.js";
export type {
  DumpCounters,
  FileSection,
  FooterInfo,
  HeaderInfo,
  OutputFormat,
} from "./document-renderer.js";
export {
  CONTINUATION_MARKER,
  SplitWriter,
  isOwnOutput,
  partFilePattern,
  partPath,
  wouldOverflow,
} from "./split-writer.js";
export type { SplitWriterOptions, SplitWriterState } from "./split-writer.js";
