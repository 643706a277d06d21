export type RunState = "pending" | "llm" | "image" | "threed" | "persisting" | "completed" | "aborted";

const TRANSITIONS: Record<RunState, RunState[]> = {
  pending: ["llm", "aborted"],
  llm: ["image", "aborted"],
  // An image-only request skips the 3D stage.
  image: ["threed", "persisting", "aborted"],
  threed: ["persisting", "aborted"],
  persisting: ["completed", "aborted"],
  completed: [],
  aborted: [],
};

const TERMINAL_STATES: RunState[] = ["completed", "aborted"];

export class InvalidRunTransitionError extends Error {
  from: RunState;
  to: RunState;

  constructor(from: RunState, to: RunState) {
    super(`Invalid run state transition: ${from} -> ${to}`);
    this.name = "InvalidRunTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function isTerminalState(state: RunState) {
  return TERMINAL_STATES.includes(state);
}

export function canTransition(from: RunState, to: RunState) {
  return (TRANSITIONS[from] ?? []).includes(to);
}

export function assertValidTransition(from: RunState, to: RunState) {
  if (!canTransition(from, to)) {
    throw new InvalidRunTransitionError(from, to);
  }
}
