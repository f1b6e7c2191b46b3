/**
 * @lexcov/report -- rendering and writing of coverage reports.
 */
export { csvField, csvRow, renderWordListCsv, renderCoverageCsv } from "./csv.js";
export { renderCoverageTable } from "./table.js";
export { renderAnalysisSummary } from "./summary.js";
export { POS_NAMES, posName } from "./pos-names.js";
export { writeReport, defaultWordListPath } from "./persist.js";
