import type { TrialResult } from "@pointing-lab/core";

/** Column order of the per-trial table. */
export const CSV_HEADERS = [
  "Trial_ID",
  "Time_Sec",
  "Distance_Px",
  "Ideal_Distance_Px",
  "Speed_PxSec",
  "Curvature",
  "Index_of_Difficulty_Bits",
  "Throughput_Bits_Sec",
  "Target_X",
  "Target_Y",
  "Peak_Velocity_PxSec",
  "Reaction_Time_Sec",
] as const;

export type CsvHeader = (typeof CSV_HEADERS)[number];

const LINE_END = "\r\n";

/**
 * One formatted row per trial. Times, curvature, ID, throughput and
 * reaction time carry 4 decimals; distances and speeds carry 2.
 * `Trial_ID` is the 1-based completion order.
 */
export function formatTrialRow(trial: TrialResult, index: number): string[] {
  return [
    String(index + 1),
    trial.timeElapsed.toFixed(4),
    trial.totalDistance.toFixed(2),
    trial.idealDistance.toFixed(2),
    trial.avgSpeed.toFixed(2),
    trial.curvature.toFixed(4),
    trial.indexOfDifficulty.toFixed(4),
    trial.throughput.toFixed(4),
    String(trial.targetPos.x),
    String(trial.targetPos.y),
    trial.peakVelocity.toFixed(2),
    trial.reactionTime.toFixed(4),
  ];
}

/** Header line plus one line per trial, CRLF-terminated. */
export function toCsv(trials: readonly TrialResult[]): string {
  const lines = [CSV_HEADERS.join(",")];
  trials.forEach((trial, i) => {
    lines.push(formatTrialRow(trial, i).join(","));
  });
  return lines.join(LINE_END) + LINE_END;
}
