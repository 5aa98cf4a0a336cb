import { describe, expect, it } from "vitest";
import type { ExpressionStatement } from "../../parser/ast.js";
import { analyzeSource, semanticErrors } from "./analyze.js";

describe("resolver", () => {
  it("resolves a call to a function declared later in the file", () => {
    const { program, resolution } = analyzeSource(
      [
        "fn main() -> Int { return helper(); }",
        "fn helper() -> Int { return 1; }",
      ].join("\n")
    );
    expect(resolution.diagnostics).toEqual([]);

    const main = program.items[0];
    const helper = program.items[1];
    if (main?.kind !== "FunctionDecl" || helper?.kind !== "FunctionDecl") {
      throw new Error("expected two functions");
    }
    const ret = main.body.statements[0];
    if (ret?.kind !== "Return" || ret.value?.kind !== "Call") {
      throw new Error("expected a returned call");
    }
    const symbol = resolution.bindings.get(ret.value.callee.id);
    expect(symbol).toBeDefined();
    expect(symbol).toBe(resolution.declarations.get(helper.id));
  });

  it("rejects a block-local variable used before its declaration", () => {
    expect(
      semanticErrors(
        ["fn main() {", "    print_int(later);", "    let later = 1;", "}"].join("\n")
      )
    ).toEqual([
      "test.kin:2:15: NameError: 'later' is used before its declaration in this block",
    ]);
  });

  it("does not fall back to an outer name that a later declaration shadows", () => {
    expect(
      semanticErrors(
        ["let x = 1;", "fn main() {", "    print_int(x);", "    let x = 2;", "}"].join("\n")
      )
    ).toEqual(["test.kin:3:15: NameError: 'x' is used before its declaration in this block"]);
  });

  it("keeps a variable out of its own initializer", () => {
    expect(semanticErrors("fn main() { let y = y; }")).toEqual([
      "test.kin:1:21: NameError: 'y' is used before its declaration in this block",
    ]);
  });

  it("reports undefined names by namespace", () => {
    expect(
      semanticErrors(
        [
          "let x: Float = 1;",
          "fn main() {",
          "    print_int(nope);",
          "    missing();",
          "}",
        ].join("\n")
      )
    ).toEqual([
      "test.kin:1:8: NameError: cannot find type 'Float' in this scope",
      "test.kin:3:15: NameError: cannot find value 'nope' in this scope",
      "test.kin:4:5: NameError: cannot find function 'missing' in this scope",
    ]);
  });

  it("reports duplicate declarations", () => {
    expect(semanticErrors("fn f() {} fn f() {}")).toEqual([
      "test.kin:1:14: NameError: 'f' is already declared in this scope",
    ]);
    expect(semanticErrors("fn f(a: Int, a: Int) {}")).toEqual([
      "test.kin:1:14: NameError: parameter 'a' is declared more than once in function 'f'",
    ]);
    expect(semanticErrors("fn f(a: Int) { let a = 1; }")).toEqual([
      "test.kin:1:20: NameError: 'a' is already declared in this scope",
    ]);
  });

  it("lets an inner block shadow a parameter", () => {
    const { program, resolution } = analyzeSource(
      "fn f(a: Int) { { let a = 2; print_int(a); } print_int(a); }"
    );
    expect(resolution.diagnostics).toEqual([]);

    const fn = program.items[0];
    if (fn?.kind !== "FunctionDecl") throw new Error("expected a function");
    const inner = fn.body.statements[0];
    const outerPrint = fn.body.statements[1];
    if (inner?.kind !== "Block" || outerPrint?.kind !== "ExpressionStatement") {
      throw new Error("unexpected body shape");
    }
    const innerPrint = inner.statements[1];
    if (innerPrint?.kind !== "ExpressionStatement") throw new Error("expected a call");

    const argOf = (stmt: ExpressionStatement) => {
      const call = stmt.expression;
      if (call.kind !== "Call" || !call.args[0]) throw new Error("expected a call");
      return resolution.bindings.get(call.args[0].id);
    };
    const innerSymbol = argOf(innerPrint);
    const outerSymbol = argOf(outerPrint);
    expect(innerSymbol).not.toBe(outerSymbol);
    expect(innerSymbol === undefined ? undefined : resolution.symbols.getSymbol(innerSymbol))
      .toMatchObject({ name: "a", storage: "local" });
    expect(outerSymbol === undefined ? undefined : resolution.symbols.getSymbol(outerSymbol))
      .toMatchObject({ name: "a", storage: "param" });
  });

  it("reports names used as the wrong kind", () => {
    expect(
      semanticErrors(
        [
          "let n = 1;",
          "fn main() {",
          "    let v = Int;",
          "    let f = main;",
          "    let x: n = 2;",
          "}",
        ].join("\n")
      )
    ).toEqual([
      "test.kin:3:13: NameError: expected a value, but 'Int' is a type",
      "test.kin:4:13: NameError: expected a value, but 'main' is a function",
      "test.kin:5:12: NameError: expected a type, but 'n' is a variable",
    ]);
  });

  it("shares one scope between a function and its body", () => {
    const { program, resolution } = analyzeSource("fn main() { { } }");
    const fn = program.items[0];
    if (fn?.kind !== "FunctionDecl") throw new Error("expected a function");
    const fnScope = resolution.scopes.get(fn.id);
    expect(resolution.scopes.get(program.id)).toBe(resolution.symbols.rootScope);
    expect(resolution.scopes.get(fn.body.id)).toBe(fnScope);

    const nested = fn.body.statements[0];
    const nestedScope = nested ? resolution.scopes.get(nested.id) : undefined;
    expect(nestedScope === undefined ? undefined : resolution.symbols.getScope(nestedScope))
      .toMatchObject({ kind: "block", parent: fnScope });
  });
});
