import { describe, expect, it } from "vitest";
import { diagnosticFromCode } from "../../diagnostics/index.js";
import { formatCliDiagnostic } from "../diagnostics.js";

const source = ["fn main() {", "    var x: Int = true;", "}"].join("\n");

const mismatch = diagnosticFromCode({
  code: "TY0001",
  params: { kind: "mismatch", expected: "Int", found: "Bool" },
  span: { file: "main.kin", start: 29, end: 33, line: 2, column: 18 },
});

describe("formatCliDiagnostic", () => {
  it("prints the location line alone without snippets", () => {
    expect(formatCliDiagnostic(mismatch, { color: false })).toBe(
      "main.kin:2:18: TypeError: mismatched types: expected Int, found Bool"
    );
  });

  it("renders the offending line with a marker under the span", () => {
    const formatted = formatCliDiagnostic(mismatch, {
      color: false,
      snippet: true,
      readSource: () => source,
    });
    expect(formatted.split("\n")).toEqual([
      "main.kin:2:18: TypeError: mismatched types: expected Int, found Bool",
      "  |",
      "2 |     var x: Int = true;",
      `  | ${" ".repeat(17)}^^^^`,
    ]);
  });

  it("falls back to the location line when the source is unavailable", () => {
    const formatted = formatCliDiagnostic(mismatch, {
      color: false,
      snippet: true,
      readSource: () => undefined,
    });
    expect(formatted).toBe(
      "main.kin:2:18: TypeError: mismatched types: expected Int, found Bool"
    );
  });

  it("appends hints after the snippet", () => {
    const diagnostic = diagnosticFromCode({
      code: "TY0004",
      params: { kind: "immutable-assignment", name: "x" },
      span: { file: "main.kin", start: 0, end: 2, line: 1, column: 1 },
    });
    const formatted = formatCliDiagnostic(diagnostic, {
      color: false,
      snippet: true,
      readSource: () => source,
    });
    expect(formatted.split("\n").at(-1)).toBe(
      "  = help: Declare the binding with `var` to make it assignable."
    );
  });

  it("colors the output by default", () => {
    const formatted = formatCliDiagnostic(mismatch, { readSource: () => source });
    const [header, , gutterLine] = formatted.split("\n");
    expect(header).toBe(
      "\u001B[35mmain.kin:2:18\u001B[0m: \u001B[1m\u001B[31mTypeError\u001B[0m\u001B[0m: mismatched types: expected Int, found Bool"
    );
    expect(gutterLine).toBe("2 |     var x: Int = true;");
  });
});
