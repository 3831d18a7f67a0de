import {
  diagnosticFromCode,
  type Diagnostic,
  type DiagnosticEmitter,
  type SourceSpan,
} from "../diagnostics/index.js";
import { describeIdentProblems } from "./attributes.js";
import type { IdentCapacityError } from "./errors.js";
import type { IdentProblem } from "./problems.js";

export const identProblemToDiagnostic = (
  problem: IdentProblem<SourceSpan>
): Diagnostic =>
  diagnosticFromCode({
    code: "ID0001",
    params: {
      kind: "ident-issue",
      problems: describeIdentProblems(problem.problems),
    },
    span: problem.region,
  });

export const capacityDiagnostic = (
  error: IdentCapacityError,
  span: SourceSpan
): Diagnostic =>
  diagnosticFromCode({
    code: "ID0002",
    params: { kind: "capacity-exceeded", limit: error.limit },
    span,
  });

/** Forwards collected style problems to the unit's emitter as warnings. */
export const reportIdentProblems = (
  problems: Iterable<IdentProblem<SourceSpan>>,
  emitter: DiagnosticEmitter
): readonly Diagnostic[] => {
  const reported: Diagnostic[] = [];
  for (const problem of problems) {
    reported.push(emitter.report(identProblemToDiagnostic(problem)));
  }
  return reported;
};
