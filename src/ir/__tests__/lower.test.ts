import { describe, expect, it } from "vitest";
import { printFunction, printModule } from "../printer.js";
import { lowerSource } from "./lower-source.js";

const lines = (...text: string[]) => text.join("\n");

describe("IR lowering", () => {
  it("gives every subexpression its own temporary", () => {
    const module = lowerSource("fn add(a: Int, b: Int) -> Int { return a + b; }");
    expect(printModule(module)).toBe(
      lines(
        "fn $init() -> unit {",
        "entry:",
        "  return",
        "}",
        "",
        "fn add(i64, i64) -> i64 {",
        "  slot $0 a: i64 param",
        "  slot $1 b: i64 param",
        "entry:",
        "  %0 = load $0",
        "  %1 = load $1",
        "  %2 = add %0, %1",
        "  return %2",
        "}",
        ""
      )
    );
  });

  it("initializes globals in dependency order and pools strings", () => {
    const module = lowerSource(
      lines(
        'let greeting = "hi";',
        "var total = base + 1;",
        "let base = 41;",
        "fn main() { print_str(greeting); print_int(total); }"
      )
    );
    expect(printModule(module)).toBe(
      lines(
        "global @greeting: str",
        "global @total: i64",
        "global @base: i64",
        'string #0 = "hi"',
        "",
        "fn $init() -> unit {",
        "entry:",
        "  store @greeting, #0",
        "  store @base, 41",
        "  %0 = load @base",
        "  %1 = add %0, 1",
        "  store @total, %1",
        "  return",
        "}",
        "",
        "fn main() -> unit {",
        "entry:",
        "  %0 = load @greeting",
        "  call print_str(%0)",
        "  %1 = load @total",
        "  call print_int(%1)",
        "  return",
        "}",
        ""
      )
    );
  });

  it("lowers conditions to branches without materializing booleans", () => {
    const module = lowerSource(
      "fn f(a: Bool, b: Bool) { if a && !b { print_int(1); } else { print_int(2); } }"
    );
    const [f] = module.functions;
    if (!f) throw new Error("expected a function");
    expect(printFunction(f)).toBe(
      lines(
        "fn f(bool, bool) -> unit {",
        "  slot $0 a: bool param",
        "  slot $1 b: bool param",
        "entry:",
        "  %0 = load $0",
        "  branch %0, and.rhs.1, if.else.0",
        "and.rhs.1:",
        "  %1 = load $1",
        "  branch %1, if.else.0, if.then.0",
        "if.then.0:",
        "  call print_int(1)",
        "  jump if.end.0",
        "if.else.0:",
        "  call print_int(2)",
        "  jump if.end.0",
        "if.end.0:",
        "  return",
        "}"
      )
    );
  });

  it("stores short-circuit values through a hidden slot and drops dead code", () => {
    const module = lowerSource(
      lines(
        "fn g(n: Int) -> Bool {",
        "    var i = 0;",
        "    while i < n { i = i + 1; }",
        "    return i > 2 || n == 0;",
        "    print_int(i);",
        "}"
      )
    );
    const [g] = module.functions;
    if (!g) throw new Error("expected a function");
    expect(printFunction(g)).toBe(
      lines(
        "fn g(i64) -> bool {",
        "  slot $0 n: i64 param",
        "  slot $1 i: i64 local",
        "  slot $2 $bool.1: bool synthetic",
        "entry:",
        "  store $1, 0",
        "  jump while.cond.0",
        "while.cond.0:",
        "  %0 = load $1",
        "  %1 = load $0",
        "  %2 = lt %0, %1",
        "  branch %2, while.body.0, while.end.0",
        "while.body.0:",
        "  %3 = load $1",
        "  %4 = add %3, 1",
        "  store $1, %4",
        "  jump while.cond.0",
        "while.end.0:",
        "  %5 = load $1",
        "  %6 = gt %5, 2",
        "  branch %6, bool.true.1, or.rhs.2",
        "or.rhs.2:",
        "  %7 = load $0",
        "  %8 = eq %7, 0",
        "  branch %8, bool.true.1, bool.false.1",
        "bool.true.1:",
        "  store $2, true",
        "  jump bool.end.1",
        "bool.false.1:",
        "  store $2, false",
        "  jump bool.end.1",
        "bool.end.1:",
        "  %9 = load $2",
        "  return %9",
        "}"
      )
    );
    expect(g.temps[2]).toBe("bool");
  });

  it("prunes the exit of an infinite loop", () => {
    const [spin] = lowerSource("fn spin() -> Int { while true { } }").functions;
    if (!spin) throw new Error("expected a function");
    expect(printFunction(spin)).toBe(
      lines(
        "fn spin() -> i64 {",
        "entry:",
        "  jump while.cond.0",
        "while.cond.0:",
        "  jump while.body.0",
        "while.body.0:",
        "  jump while.cond.0",
        "}"
      )
    );
  });

  it("distinguishes builtin calls from calls to user functions", () => {
    const module = lowerSource(
      "fn one() -> Int { return 1; } fn main() { print_int(one()); }"
    );
    const main = module.functions.find((fn) => fn.name === "main");
    const calls = main?.blocks.flatMap((block) =>
      block.instructions.flatMap((instruction) =>
        instruction.op === "call" ? [instruction.callee] : []
      )
    );
    expect(calls).toEqual([
      { kind: "function", name: "one" },
      { kind: "builtin", name: "print_int" },
    ]);
  });
});
