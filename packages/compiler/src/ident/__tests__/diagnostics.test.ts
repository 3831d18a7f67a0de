import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  formatDiagnostic,
  type SourceSpan,
} from "../../diagnostics/index.js";
import {
  capacityDiagnostic,
  identProblemToDiagnostic,
  reportIdentProblems,
} from "../diagnostics.js";
import { IdentCapacityError } from "../errors.js";
import { IdentProblemList } from "../problems.js";
import { IdentStore } from "../store.js";

const span: SourceSpan = { file: "main.tl", start: 4, end: 8 };

describe("identifier diagnostics", () => {
  it("turns style problems into parser warnings", () => {
    const diagnostic = identProblemToDiagnostic({
      kind: "IdentIssue",
      problems: { subsequentUnderscores: true },
      region: span,
    });

    expect(diagnostic.code).toBe("ID0001");
    expect(diagnostic.severity).toBe("warning");
    expect(diagnostic.phase).toBe("parser");
    expect(diagnostic.span).toEqual(span);
    expect(formatDiagnostic(diagnostic)).toBe(
      "main.tl:4-8 WARNING [parser] ID0001: identifier has style issues: subsequent underscores"
    );
    expect(diagnostic.hints?.[0]?.message).toContain("single underscore");
  });

  it("forwards collected problems to the emitter", () => {
    const store = new IdentStore();
    const problems = new IdentProblemList<SourceSpan>();
    store.insert("a__b", span, problems);
    store.insert("ok", { file: "main.tl", start: 9, end: 11 }, problems);
    store.insert("c__d", { file: "main.tl", start: 12, end: 16 }, problems);

    const emitter = new DiagnosticEmitter();
    const reported = reportIdentProblems(problems.problems, emitter);

    expect(reported).toHaveLength(2);
    expect(emitter.warnings.map((warning) => warning.span.start)).toEqual([
      4, 12,
    ]);
  });

  it("describes capacity failures as errors", () => {
    const diagnostic = capacityDiagnostic(new IdentCapacityError(3), span);

    expect(diagnostic.severity).toBe("error");
    expect(diagnostic.message).toBe(
      "too many identifiers in one compilation unit (limit 3)"
    );
  });
});
