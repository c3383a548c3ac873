import type { RunReport } from "./types.js";

/** Human-readable provenance report: a run line, then one line per task in canonical order. */
export function formatReport(report: RunReport, truncate: number): string[] {
  const lines = [`Run ${report.runId} (${report.pipeline}): ${report.status}${report.error ? ` (${report.error})` : ""}`];
  for (const t of report.tasks) {
    const attempts = t.attempts != null ? ` attempts=${t.attempts}` : "";
    const duration = t.durationMs != null ? ` ${t.durationMs}ms` : "";
    lines.push(`  [${t.provenance ?? t.state}] ${t.taskId} (${t.kind})${attempts}${duration}`);
    for (const e of t.errors ?? []) lines.push(`      ${e.length > truncate ? e.slice(0, truncate) + "…" : e}`);
  }
  return lines;
}

/** Only a complete run exits cleanly; aborted and still-active runs do not. */
export function exitCodeFor(report: Pick<RunReport, "status">): 0 | 1 {
  return report.status === "complete" ? 0 : 1;
}
