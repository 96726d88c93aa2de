export { buildReport, formatSources, REPORT_TITLE_PREFIX } from "./report.js";
export type { ReportInput } from "./report.js";
