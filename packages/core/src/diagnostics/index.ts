export type {
  DiagnosticSeverity,
  DiagnosticsSink,
  IssueReporter,
  LayoutDiagnostic,
  LayoutDiagnosticCode,
} from "./types.js";
export { DIAGNOSTIC_SEVERITY } from "./types.js";
export {
  type ConsoleDiagnostics,
  createConsoleDiagnostics,
  formatDiagnostic,
  silentDiagnostics,
} from "./console.js";
export {
  type AggregatedDiagnostic,
  type DiagnosticsCollector,
  type DiagnosticsListener,
  createDiagnosticsCollector,
} from "./collector.js";
