// @pointing-lab/export
// Tabular and structured export of finalized pointing sessions.

export { CSV_HEADERS, formatTrialRow, toCsv } from "./csv.js";
export type { CsvHeader } from "./csv.js";

export {
  buildStructuredExport,
  toStructuredJson,
  parseStructuredExport,
} from "./json.js";
export type {
  SampleTriple,
  ExportedPlanEntry,
  ExportedTrial,
  ExportedSummary,
  StructuredExport,
  ExportMetadata,
  ParsedSession,
} from "./json.js";

export {
  saveSession,
  platformIdentifier,
  formatFileTimestamp,
} from "./writer.js";
export type { SaveSessionOptions, SavedSessionPaths } from "./writer.js";

export { formatSessionReport } from "./report.js";

export { ExportError, ExportFormatError, PersistenceError } from "./errors.js";
