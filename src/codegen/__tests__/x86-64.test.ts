import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  formatDiagnostic,
} from "../../diagnostics/index.js";
import { lowerSource } from "../../ir/__tests__/lower-source.js";
import { generateAssembly, type NativePlatform } from "../x86-64.js";

const assemble = (source: string, platform: NativePlatform = "linux") =>
  generateAssembly(lowerSource(source), new DiagnosticEmitter(), { platform });

const codegenError = (source: string): string => {
  try {
    assemble(source);
  } catch (error) {
    if (error instanceof DiagnosticError) return formatDiagnostic(error.diagnostic);
    throw error;
  }
  throw new Error("expected a codegen error");
};

const lines = (...text: string[]) => text.join("\n");

describe("x86-64 code generation", () => {
  it("gives every temporary a frame slot and computes through %rax", () => {
    const asm = assemble("fn main() -> Int { return 40 + 2; }");
    expect(asm).toContain(
      lines(
        "kin_fn_main:",
        "\tpushq\t%rbp",
        "\tmovq\t%rsp, %rbp",
        "\tsubq\t$16, %rsp",
        ".Lk1.entry:",
        "\tmovq\t$40, %rax",
        "\tmovq\t$2, %rcx",
        "\taddq\t%rcx, %rax",
        "\tmovq\t%rax, -8(%rbp)",
        "\tmovq\t-8(%rbp), %rax",
        "\tleave",
        "\tret"
      )
    );
  });

  it("runs the global initializers before main", () => {
    const asm = assemble("fn main() { print_int(1); }");
    expect(asm).toContain(
      lines(
        "\t.globl\tmain",
        "main:",
        "\tpushq\t%rbp",
        "\tmovq\t%rsp, %rbp",
        "\tcall\t__kindred_init",
        "\tcall\tkin_fn_main",
        "\txorl\t%eax, %eax",
        "\tpopq\t%rbp",
        "\tret"
      )
    );
  });

  it("spills parameters from the argument registers", () => {
    const asm = assemble(
      "fn pick(a: Int, b: Bool, c: Int) -> Int { return c; } fn main() -> Int { return pick(1, true, 3); }"
    );
    expect(asm).toContain(
      lines(
        "\tmovq\t%rdi, -8(%rbp)",
        "\tmovq\t%rsi, -16(%rbp)",
        "\tmovq\t%rdx, -24(%rbp)"
      )
    );
    expect(asm).toContain(
      lines(
        "\tmovq\t$1, %rdi",
        "\tmovq\t$1, %rsi",
        "\tmovq\t$3, %rdx",
        "\tcall\tkin_fn_pick",
        "\tmovq\t%rax, -8(%rbp)"
      )
    );
  });

  it("uses a 64-bit immediate only when a literal needs one", () => {
    const asm = assemble("fn main() -> Int { return 5000000000 - 2147483647; }");
    expect(asm).toContain("\tmovabsq\t$5000000000, %rax");
    expect(asm).toContain("\tmovq\t$2147483647, %rcx");
  });

  it("divides with cqto and idivq", () => {
    const asm = assemble("fn main() -> Int { let a = 7; return a % 2; }");
    expect(asm).toContain(
      lines("\tcqto", "\tidivq\t%rcx", "\tmovq\t%rdx, -24(%rbp)")
    );
  });

  it("emits string literals as NUL-terminated bytes", () => {
    const asm = assemble('fn main() { print_str("hi"); }');
    expect(asm).toContain(lines(".Lstr.0:", "\t.byte\t104, 105, 0"));
    expect(asm).toContain("\tleaq\t.Lstr.0(%rip), %rdi");
  });

  it("reserves storage for globals", () => {
    const asm = assemble("var count = 3; fn main() { count = count + 1; }");
    expect(asm).toContain(lines("\t.data", "\t.p2align\t3", "kin_var_count:", "\t.quad\t0"));
    expect(asm).toContain("\tmovq\t%rax, kin_var_count(%rip)");
  });

  it("marks the stack non-executable on linux only", () => {
    const source = "fn main() {}";
    expect(assemble(source).endsWith('\t.section\t.note.GNU-stack,"",@progbits\n')).toBe(true);
    expect(assemble(source, "darwin")).not.toContain(".note.GNU-stack");
  });

  it("follows Mach-O naming on darwin", () => {
    const asm = assemble('fn main() { print_str("x"); }', "darwin");
    expect(asm).toContain("_kin_fn_main:");
    expect(asm).toContain("\tcall\t_puts");
    expect(asm).toContain("Lk1.entry:");
    expect(asm).toContain("\tleaq\tLstr.0(%rip), %rdi");
  });

  it("is deterministic", () => {
    const source = [
      "let base = 2;",
      "fn twice(n: Int) -> Int { return n * base; }",
      "fn main() -> Int { if twice(3) > 5 && true { return 1; } return 0; }",
    ].join("\n");
    expect(assemble(source)).toBe(assemble(source));
  });

  it("requires a main function", () => {
    expect(codegenError("fn helper() {}")).toBe(
      "test.kin:1:1: CodegenError: program has no `fn main()` entry point"
    );
  });

  it("checks the entry point signature", () => {
    expect(codegenError("fn main(code: Int) {}")).toBe(
      "test.kin:1:4: CodegenError: entry point must have type fn() -> Int or fn() -> Unit, found fn(Int) -> Unit"
    );
    expect(codegenError("fn main() -> Bool { return true; }")).toBe(
      "test.kin:1:4: CodegenError: entry point must have type fn() -> Int or fn() -> Unit, found fn() -> Bool"
    );
  });

  it("rejects functions with more parameters than argument registers", () => {
    expect(
      codegenError(
        "fn wide(a: Int, b: Int, c: Int, d: Int, e: Int, f: Int, g: Int) {} fn main() {}"
      )
    ).toBe(
      "test.kin:1:4: CodegenError: function 'wide' has 7 parameters; the native target supports at most 6"
    );
  });
});
