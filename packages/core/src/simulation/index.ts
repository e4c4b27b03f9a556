export { SimulatedParticipant } from "./participant.js";
export type { SimulatedParticipantConfig, SecondsRange } from "./participant.js";

export { ManualClock } from "./clock.js";

export { runSession } from "./run.js";
export type { RunSessionOptions } from "./run.js";
