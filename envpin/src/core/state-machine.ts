/**
 * Pipeline stages in order.
 */
export const STAGES = ["fetching", "indexing", "resolving", "writing"] as const;

export type Stage = (typeof STAGES)[number];

export type PipelineStatus = "idle" | Stage | "done" | "failed";

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "start" | "success" | "failure";

export function isTerminal(status: PipelineStatus): status is "done" | "failed" {
  return status === "done" || status === "failed";
}

export function isStage(status: PipelineStatus): status is Stage {
  return status !== "idle" && !isTerminal(status);
}

/**
 * Pure function: given current status + event, return next status.
 * Single pass, no loops: `success` only ever moves forward.
 */
export function nextState(current: PipelineStatus, event: TransitionEvent): PipelineStatus {
  if (isTerminal(current)) {
    throw new Error(`No transition from terminal state ${current}`);
  }
  if (event === "failure") return "failed";

  if (current === "idle") {
    if (event !== "start") throw new Error(`Invalid event ${event} in state idle`);
    return STAGES[0];
  }

  if (event !== "success") throw new Error(`Invalid event ${event} in state ${current}`);
  const idx = STAGES.indexOf(current);
  return idx >= STAGES.length - 1 ? "done" : STAGES[idx + 1];
}
