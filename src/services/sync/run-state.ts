/**
 * Sync run state machine
 *
 * Idle -> Fetching -> Parsing -> Projecting -> Upserting -> Committed | PartiallyFailed
 * Any non-terminal state may move to Failed.
 */

import { InvalidTransitionError } from "./errors.js";

import type { RunState, TerminalRunState } from "../../types/index.js";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  Idle: ["Fetching", "Failed"],
  Fetching: ["Parsing", "Failed"],
  Parsing: ["Projecting", "Failed"],
  Projecting: ["Upserting", "Failed"],
  Upserting: ["Committed", "PartiallyFailed", "Failed"],
  Committed: [],
  PartiallyFailed: [],
  Failed: [],
};

export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: RunState): state is TerminalRunState {
  return TRANSITIONS[state].length === 0;
}

export class RunStateMachine {
  private current: RunState = "Idle";
  private readonly history: RunState[] = ["Idle"];

  get state(): RunState {
    return this.current;
  }

  get path(): readonly RunState[] {
    return this.history;
  }

  transition(to: RunState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push(to);
  }

  fail(): void {
    if (!isTerminal(this.current)) {
      this.transition("Failed");
    }
  }
}
