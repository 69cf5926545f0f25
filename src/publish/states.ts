export type PublishState =
  | "start"
  | "checking-divergence"
  | "aborted-precondition"
  | "aborted-diverged"
  | "aborted-behind"
  | "aborted-unreachable"
  | "pushing-private"
  | "aborted-push-failed"
  | "aborted-git-failed"
  | "building-filtered-tree"
  | "comparing-trees"
  | "no-op-done"
  | "synthesizing-commit"
  | "pushing-public"
  | "done";

const TRANSITIONS: Record<PublishState, readonly PublishState[]> = {
  start: ["checking-divergence", "aborted-precondition"],
  "checking-divergence": [
    "pushing-private",
    "aborted-diverged",
    "aborted-behind",
    "aborted-unreachable",
    "aborted-git-failed",
  ],
  "pushing-private": ["building-filtered-tree", "aborted-push-failed", "aborted-git-failed"],
  "building-filtered-tree": ["comparing-trees", "aborted-git-failed"],
  "comparing-trees": ["no-op-done", "synthesizing-commit", "pushing-public", "aborted-unreachable", "aborted-git-failed"],
  "synthesizing-commit": ["pushing-public", "aborted-git-failed"],
  "pushing-public": ["done", "aborted-push-failed", "aborted-git-failed"],
  "aborted-precondition": [],
  "aborted-diverged": [],
  "aborted-behind": [],
  "aborted-unreachable": [],
  "aborted-push-failed": [],
  "aborted-git-failed": [],
  "no-op-done": [],
  done: [],
};

export function isTerminal(state: PublishState) {
  return TRANSITIONS[state].length === 0;
}

/** Records the states one publish run passes through and rejects illegal moves. */
export class PublishStateMachine {
  private current: PublishState = "start";
  private readonly trail: PublishState[] = ["start"];

  get state() {
    return this.current;
  }

  get history(): readonly PublishState[] {
    return this.trail;
  }

  transition(next: PublishState) {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal publish state transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.trail.push(next);
  }
}
