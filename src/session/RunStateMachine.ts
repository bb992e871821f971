import { StateError } from "../errors";
import { RunState } from "../types";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  init: ["bucketEnsured", "aborted"],
  bucketEnsured: ["uploaded", "aborted"],
  uploaded: ["listed", "aborted"],
  listed: ["downloaded", "aborted"],
  downloaded: ["objectsDeleted", "aborted"],
  objectsDeleted: ["bucketDeleted", "aborted"],
  bucketDeleted: ["done", "aborted"],
  done: [],
  aborted: [],
};

/**
 * Tracks the progress of one run and rejects out-of-order transitions
 */
export class RunStateMachine {
  private current: RunState = "init";
  private readonly history: RunState[] = ["init"];

  get state(): RunState {
    return this.current;
  }

  canTransition(next: RunState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: RunState): void {
    if (!this.canTransition(next)) {
      throw new StateError(
        `Illegal run state transition: ${this.current} -> ${next}`,
      );
    }
    this.current = next;
    this.history.push(next);
  }

  abort(): void {
    this.transition("aborted");
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  getHistory(): RunState[] {
    return [...this.history];
  }
}
