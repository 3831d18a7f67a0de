import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  createDiagnostic,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with the inferred phase", () => {
    const diagnostic = createDiagnostic({
      code: "ID0099",
      message: "test diagnostic",
      span: { file: "file.tl", start: 1, end: 3 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "file.tl:1-3 ERROR [parser] ID0099: test diagnostic"
    );
  });

  it("takes severity and phase from the registry", () => {
    const diagnostic = diagnosticFromCode({
      code: "ID0002",
      params: { kind: "capacity-exceeded", limit: 8 },
      span: { file: "file.tl", start: 0, end: 1 },
    });

    expect(diagnostic.severity).toBe("error");
    expect(diagnostic.phase).toBe("parser");
    expect(diagnostic.message).toContain("limit 8");
  });

  it("lists the registered codes", () => {
    expect(diagnosticCodes()).toEqual(["ID0001", "ID0002"]);
  });

  it("leaves the phase unset for unknown prefixes", () => {
    const diagnostic = createDiagnostic({
      code: "XX0001",
      message: "stray",
      severity: "note",
      span: { file: "file.tl", start: 0, end: 0 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "file.tl:0-0 NOTE XX0001: stray"
    );
  });

  it("throws collected diagnostics on error", () => {
    const emitter = new DiagnosticEmitter();
    emitter.report({
      code: "ID0001",
      message: "first",
      severity: "warning",
      span: { file: "file.tl", start: 0, end: 1 },
    });

    try {
      emitter.error({
        code: "ID0002",
        message: "fatal",
        span: { file: "file.tl", start: 2, end: 3 },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DiagnosticError);
      if (error instanceof DiagnosticError) {
        expect(error.diagnostic.message).toBe("fatal");
        expect(error.diagnostics).toHaveLength(2);
      }
    }
  });
});
