// ---------- Sheet boundary (stable public API) ----------
export {
  readWorkbook,
  readWorkbookSheet,
  pickWorksheet,
  worksheetAsSheet,
  writeWorkbook,
  setCell,
} from "./xlsx-sheet.js";
export type { WorkbookSheetOptions } from "./xlsx-sheet.js";

// ---------- Output shapes ----------
export { freshWorkbookShape, templateOverlayShape, inPlaceUpdateShape, OUTPUT_HEADERS } from "./shapes.js";
export type { OutputShape, OutputArtifact, TemplateOverlayOptions, InPlaceUpdateOptions } from "./shapes.js";

// ---------- Archive split ----------
export { renderOutput } from "./archive.js";
export type { RenderOptions, RenderedOutput } from "./archive.js";

// ---------- Issue export ----------
export { exportIssues, ISSUE_COLUMNS } from "./issues.js";
export type { IssueFormat } from "./issues.js";
