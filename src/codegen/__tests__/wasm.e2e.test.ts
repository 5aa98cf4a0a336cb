import { describe, test } from "vitest";
import { DiagnosticEmitter } from "../../diagnostics/index.js";
import { lowerSource } from "../../ir/__tests__/lower-source.js";
import { run } from "../../run.js";
import { generateWasm } from "../wasm.js";

const compileWasm = (source: string, optimize = false) =>
  generateWasm(lowerSource(source), new DiagnosticEmitter(), { optimize });

const execute = (source: string, optimize = false) => {
  const output: string[] = [];
  const status = run(compileWasm(source, optimize).binary, {
    writeLine: (line) => output.push(line),
  });
  return { status, output };
};

const fibonacci = [
  "let limit = 5;",
  "fn fib(n: Int) -> Int {",
  "    if n < 2 { return n; }",
  "    return fib(n - 1) + fib(n - 2);",
  "}",
  "fn main() -> Int {",
  "    var i = 0;",
  "    while i < limit {",
  "        print_int(fib(i));",
  "        i = i + 1;",
  "    }",
  "    print_bool(i == limit && !false);",
  '    print_str("done");',
  "    return 7;",
  "}",
].join("\n");

describe("wasm code generation", () => {
  test("runs a program and reports its exit status", (t) => {
    const { status, output } = execute(fibonacci);
    t.expect(output).toEqual(["0", "1", "1", "2", "3", "true", "done"]);
    t.expect(status).toBe(7);
  });

  test("optimized output behaves the same", (t) => {
    t.expect(execute(fibonacci, true)).toEqual(execute(fibonacci));
  });

  test("a Unit main exits with status 0", (t) => {
    t.expect(execute("fn main() { print_int(-4); }")).toEqual({ status: 0, output: ["-4"] });
  });

  test("short-circuit operators skip their right operand", (t) => {
    const { output } = execute(
      [
        'fn noisy() -> Bool { print_str("evaluated"); return true; }',
        "fn main() {",
        "    if false && noisy() { print_int(1); }",
        "    let b = true || noisy();",
        "    print_bool(b);",
        "    print_bool(false || noisy());",
        "}",
      ].join("\n")
    );
    t.expect(output).toEqual(["true", "evaluated", "true"]);
  });

  test("integer arithmetic wraps and truncates toward zero", (t) => {
    const { output } = execute(
      [
        "fn main() {",
        "    print_int(9223372036854775807 + 1);",
        "    print_int(-7 / 2);",
        "    print_int(-7 % 2);",
        "    print_bool(!(3 <> 3));",
        "}",
      ].join("\n")
    );
    t.expect(output).toEqual(["-9223372036854775808", "-3", "-1", "true"]);
  });

  test("division by zero traps", (t) => {
    t.expect(() => execute("fn main() -> Int { let zero = 0; return 1 / zero; }")).toThrow(
      WebAssembly.RuntimeError
    );
  });

  test("globals are initialized in dependency order", (t) => {
    const { status } = execute(
      "let total = base * 2;\nlet base = 21;\nfn main() -> Int { return total; }"
    );
    t.expect(status).toBe(42);
  });

  test("strings are UTF-8 in linear memory", (t) => {
    t.expect(execute('fn main() { print_str("héllo"); print_str(""); }').output).toEqual([
      "héllo",
      "",
    ]);
  });

  test("has no parameter limit", (t) => {
    const { status } = execute(
      [
        "fn wide(a: Int, b: Int, c: Int, d: Int, e: Int, f: Int, g: Int) -> Int {",
        "    return a + b + c + d + e + f + g;",
        "}",
        "fn main() -> Int { return wide(1, 2, 3, 4, 5, 6, 7); }",
      ].join("\n")
    );
    t.expect(status).toBe(28);
  });

  test("user functions may take the names of the entry export and the initializer", (t) => {
    const { status, output } = execute(
      [
        "fn _start() { print_int(1); }",
        "fn __kindred_init() -> Int { return 2; }",
        "fn main() -> Int { _start(); return __kindred_init(); }",
      ].join("\n")
    );
    t.expect(output).toEqual(["1"]);
    t.expect(status).toBe(2);
  });

  test("is deterministic", (t) => {
    const first = compileWasm(fibonacci);
    const second = compileWasm(fibonacci);
    t.expect(second.text).toBe(first.text);
    t.expect(Array.from(second.binary)).toEqual(Array.from(first.binary));
  });
});
