/**
 * Headless session: drives the pointing engine with a simulated participant.
 *
 * No display is needed. A seeded participant works through a preset-mode
 * session, every trial is printed as it finishes, and both export files are
 * written at the end.
 *
 * Run:
 *   npx tsx examples/headless-session/index.ts [seed] [output-dir]
 *
 * What it demonstrates:
 * 1. SessionController driven purely through dispatch()
 * 2. Controlled target placement from a balanced trial plan
 * 3. Per-trial metrics and the session summary
 * 4. CSV + JSON persistence
 */

import {
  ManualClock,
  SessionController,
  SimulatedParticipant,
  createSeededRandom,
  runSession,
} from "@pointing-lab/core";
import { formatSessionReport, saveSession } from "@pointing-lab/export";

async function main() {
  const seed = process.argv[2] ?? "demo";
  const outputDir = process.argv[3] ?? "sessions";

  const random = createSeededRandom(seed);
  const clock = new ManualClock();
  const controller = new SessionController({
    clock: clock.asFn(),
    random,
    canvas: { width: 1280, height: 720 },
  });
  const participant = new SimulatedParticipant({ random });

  controller.on("warning", (w) => console.log(`Config: ${w.message}`));
  controller.on("target", (t) => {
    const how = t.placement.fellBack ? "free (fallback)" : t.placement.policy;
    console.log(`Target ${t.trialIndex}: (${t.position.x}, ${t.position.y}) r=${t.radius} [${how}]`);
  });
  controller.on("trial", (r, i) => {
    console.log(
      `  trial ${i}: ${r.timeElapsed.toFixed(3)} s, ` +
        `ID ${r.indexOfDifficulty.toFixed(2)} bits, ` +
        `TP ${r.throughput.toFixed(2)} bits/s, ` +
        `curvature ${r.curvature.toFixed(2)}`
    );
  });

  console.log(`Seed: ${seed}`);
  console.log();

  const record = runSession({
    controller,
    participant,
    clock,
    config: { mode: "preset", trialCount: 12 },
    interTrialPause: 0.4,
  });

  if (!record || !record.summary) {
    console.log("Session ended without completed trials.");
    return;
  }

  const saved = await saveSession(record, outputDir);
  console.log();
  console.log(formatSessionReport(record.summary, saved));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
