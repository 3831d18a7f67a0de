import type { IdentProblems } from "./attributes.js";

export type IdentProblem<R> = {
  kind: "IdentIssue";
  problems: IdentProblems;
  region: R;
};

/** Receives style problems found while identifiers are inserted. */
export interface IdentProblemSink<R> {
  report(problem: IdentProblem<R>): void;
}

export class IdentProblemList<R> implements IdentProblemSink<R> {
  #problems: IdentProblem<R>[] = [];

  report(problem: IdentProblem<R>): void {
    this.#problems.push(problem);
  }

  get problems(): readonly IdentProblem<R>[] {
    return this.#problems;
  }

  get size(): number {
    return this.#problems.length;
  }
}
