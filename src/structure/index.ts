export {
  TRUNCATION_MARKER,
  collectStructure,
  renderEntry,
  renderStructure,
} from "./structure-renderer.js";
export type {
  StructureEntry,
  StructureListing,
  StructureOptions,
} from "./structure-renderer.js";
