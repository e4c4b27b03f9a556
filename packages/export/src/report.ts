import type { SessionSummary } from "@pointing-lab/core";
import type { SavedSessionPaths } from "./writer.js";

/**
 * Plain-text session summary for display after a session ends.
 * Saved file paths are appended when the save succeeded.
 */
export function formatSessionReport(
  summary: SessionSummary,
  saved?: SavedSessionPaths,
): string {
  const lines = [
    "--- Session complete ---",
    `Trials: ${summary.trialCount}`,
    "",
    `Mean time: ${summary.avgTime.toFixed(3)} s`,
    `Mean speed: ${summary.avgSpeed.toFixed(0)} px/s`,
    `Mean throughput: ${summary.avgThroughput.toFixed(2)} bits/s`,
    `Mean curvature: ${summary.avgCurvature.toFixed(2)} (ideal = 1.00)`,
  ];
  if (saved) {
    lines.push("", `CSV: ${saved.csvPath}`, `JSON: ${saved.jsonPath}`);
  }
  return lines.join("\n");
}
