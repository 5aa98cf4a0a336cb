import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
  ErrorKind,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  kind: ErrorKind;
  variant: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export type NameNamespace = "value" | "type" | "function";

const mutableBindingHint: DiagnosticHint = {
  message: "Declare the binding with `var` to make it assignable.",
};

type DiagnosticParamsMap = {
  LX0001: { kind: "unterminated-string" };
  LX0002: { kind: "invalid-escape"; sequence: string };
  LX0003: { kind: "unexpected-char"; char: string };
  LX0004:
    | { kind: "invalid-number"; literal: string }
    | { kind: "unsupported-float"; literal: string };
  LX0005: { kind: "unterminated-comment" };
  PS0001: { kind: "unexpected-token"; expected: string; found: string };
  PS0002: { kind: "expected-expression"; found: string };
  PS0003: { kind: "invalid-assignment-target" };
  NM0001: { kind: "undefined"; name: string; namespace: NameNamespace };
  NM0002:
    | { kind: "duplicate-declaration"; name: string }
    | { kind: "duplicate-parameter"; name: string; functionName: string };
  NM0003: { kind: "used-before-declaration"; name: string };
  NM0004: {
    kind: "wrong-kind";
    name: string;
    expected: NameNamespace;
    found: "variable" | "function" | "type";
  };
  TY0001: { kind: "mismatch"; expected: string; found: string };
  TY0002: {
    kind: "arity-mismatch";
    callee: string;
    expected: number;
    found: number;
  };
  TY0003: { kind: "not-callable"; found: string };
  TY0004: { kind: "immutable-assignment"; name: string };
  TY0005: { kind: "missing-return"; functionName: string; returnType: string };
  TY0006:
    | { kind: "unsupported-operand"; operator: string; type: string }
    | { kind: "unit-binding"; name: string };
  TY0007: { kind: "cyclic-definition"; name: string };
  CG0001: { kind: "missing-entry" };
  CG0002: { kind: "invalid-entry-signature"; found: string };
  CG0003: {
    kind: "too-many-parameters";
    functionName: string;
    count: number;
    limit: number;
  };
  CG0004: { kind: "invalid-module"; target: string };
  BL0001: {
    kind: "toolchain-failure";
    command: string;
    exitCode: number;
    stderr: string;
  };
  BL0002: { kind: "toolchain-not-found"; command: string };
  BL0003: { kind: "toolchain-timeout"; command: string; timeoutMs: number };
  IO0001: { kind: "read-failed"; path: string; reason: string };
  IO0002: { kind: "write-failed"; path: string; reason: string };
  IO0003:
    | { kind: "remove-failed"; path: string; reason: string }
    | { kind: "unsafe-clean"; path: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const describeNamespace = (namespace: NameNamespace): string => {
  switch (namespace) {
    case "value":
      return "value";
    case "type":
      return "type";
    case "function":
      return "function";
  }
  return exhaustive(namespace);
};

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LX0001: {
    code: "LX0001",
    kind: "LexError",
    variant: "UnterminatedString",
    message: () => "unterminated string literal",
    phase: "lexer",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0001"]>,
  LX0002: {
    code: "LX0002",
    kind: "LexError",
    variant: "InvalidEscape",
    message: (params) => `invalid escape sequence '${params.sequence}'`,
    phase: "lexer",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0002"]>,
  LX0003: {
    code: "LX0003",
    kind: "LexError",
    variant: "UnexpectedChar",
    message: (params) => `unexpected character '${params.char}'`,
    phase: "lexer",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0003"]>,
  LX0004: {
    code: "LX0004",
    kind: "LexError",
    variant: "InvalidNumber",
    message: (params) =>
      params.kind === "unsupported-float"
        ? `float literal ${params.literal} is not supported; Kindred only has Int`
        : `integer literal ${params.literal} does not fit in a 64-bit Int`,
    phase: "lexer",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0004"]>,
  LX0005: {
    code: "LX0005",
    kind: "LexError",
    variant: "UnterminatedComment",
    message: () => "unterminated block comment",
    phase: "lexer",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0005"]>,
  PS0001: {
    code: "PS0001",
    kind: "ParseError",
    variant: "UnexpectedToken",
    message: (params) => `expected ${params.expected}, found ${params.found}`,
    phase: "parser",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0001"]>,
  PS0002: {
    code: "PS0002",
    kind: "ParseError",
    variant: "ExpectedExpression",
    message: (params) => `expected an expression, found ${params.found}`,
    phase: "parser",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0002"]>,
  PS0003: {
    code: "PS0003",
    kind: "ParseError",
    variant: "InvalidAssignmentTarget",
    message: () => "only a variable name can appear on the left of '='",
    phase: "parser",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0003"]>,
  NM0001: {
    code: "NM0001",
    kind: "NameError",
    variant: "Undefined",
    message: (params) =>
      `cannot find ${describeNamespace(params.namespace)} '${params.name}' in this scope`,
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NM0001"]>,
  NM0002: {
    code: "NM0002",
    kind: "NameError",
    variant: "DuplicateDeclaration",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-declaration":
          return `'${params.name}' is already declared in this scope`;
        case "duplicate-parameter":
          return `parameter '${params.name}' is declared more than once in function '${params.functionName}'`;
      }
      return exhaustive(params);
    },
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NM0002"]>,
  NM0003: {
    code: "NM0003",
    kind: "NameError",
    variant: "UsedBeforeDeclaration",
    message: (params) =>
      `'${params.name}' is used before its declaration in this block`,
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NM0003"]>,
  NM0004: {
    code: "NM0004",
    kind: "NameError",
    variant: "WrongKind",
    message: (params) =>
      `expected a ${describeNamespace(params.expected)}, but '${params.name}' is a ${params.found}`,
    phase: "resolver",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["NM0004"]>,
  TY0001: {
    code: "TY0001",
    kind: "TypeError",
    variant: "Mismatch",
    message: (params) =>
      `mismatched types: expected ${params.expected}, found ${params.found}`,
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
  TY0002: {
    code: "TY0002",
    kind: "TypeError",
    variant: "ArityMismatch",
    message: (params) =>
      `function '${params.callee}' takes ${params.expected} argument${params.expected === 1 ? "" : "s"} but ${params.found} ${params.found === 1 ? "was" : "were"} supplied`,
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0002"]>,
  TY0003: {
    code: "TY0003",
    kind: "TypeError",
    variant: "NotCallable",
    message: (params) => `expression of type ${params.found} is not callable`,
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0003"]>,
  TY0004: {
    code: "TY0004",
    kind: "TypeError",
    variant: "ImmutableAssignment",
    message: (params) => `cannot assign twice to immutable binding '${params.name}'`,
    phase: "typing",
    hints: [mutableBindingHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0004"]>,
  TY0005: {
    code: "TY0005",
    kind: "TypeError",
    variant: "MissingReturn",
    message: (params) =>
      `function '${params.functionName}' must return a value of type ${params.returnType} on every path`,
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0005"]>,
  TY0006: {
    code: "TY0006",
    kind: "TypeError",
    variant: "UnsupportedOperand",
    message: (params) => {
      switch (params.kind) {
        case "unsupported-operand":
          return `operator '${params.operator}' cannot be applied to values of type ${params.type}`;
        case "unit-binding":
          return `'${params.name}' cannot hold a value of type Unit`;
      }
      return exhaustive(params);
    },
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0006"]>,
  TY0007: {
    code: "TY0007",
    kind: "TypeError",
    variant: "CyclicDefinition",
    message: (params) =>
      `the initializer of global '${params.name}' depends on itself`,
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0007"]>,
  CG0001: {
    code: "CG0001",
    kind: "CodegenError",
    variant: "MissingEntry",
    message: () => "program has no `fn main()` entry point",
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0001"]>,
  CG0002: {
    code: "CG0002",
    kind: "CodegenError",
    variant: "InvalidEntrySignature",
    message: (params) =>
      `entry point must have type fn() -> Int or fn() -> Unit, found ${params.found}`,
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0002"]>,
  CG0003: {
    code: "CG0003",
    kind: "CodegenError",
    variant: "TooManyParameters",
    message: (params) =>
      `function '${params.functionName}' has ${params.count} parameters; the native target supports at most ${params.limit}`,
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0003"]>,
  CG0004: {
    code: "CG0004",
    kind: "CodegenError",
    variant: "InvalidModule",
    message: (params) => `generated ${params.target} module failed validation`,
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0004"]>,
  BL0001: {
    code: "BL0001",
    kind: "BuildError",
    variant: "ToolchainFailure",
    message: (params) => {
      const stderr = params.stderr.trim();
      const detail = stderr.length > 0 ? `\n${stderr}` : "";
      return `'${params.command}' exited with code ${params.exitCode}${detail}`;
    },
    phase: "build",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BL0001"]>,
  BL0002: {
    code: "BL0002",
    kind: "BuildError",
    variant: "ToolchainNotFound",
    message: (params) =>
      `toolchain driver '${params.command}' could not be found (set KINDRED_CC or pass --cc)`,
    phase: "build",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BL0002"]>,
  BL0003: {
    code: "BL0003",
    kind: "BuildError",
    variant: "ToolchainTimeout",
    message: (params) =>
      `'${params.command}' did not finish within ${params.timeoutMs}ms`,
    phase: "build",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BL0003"]>,
  IO0001: {
    code: "IO0001",
    kind: "IoError",
    variant: "ReadFailed",
    message: (params) => `cannot read ${params.path}: ${params.reason}`,
    phase: "io",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IO0001"]>,
  IO0002: {
    code: "IO0002",
    kind: "IoError",
    variant: "WriteFailed",
    message: (params) => `cannot write ${params.path}: ${params.reason}`,
    phase: "io",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IO0002"]>,
  IO0003: {
    code: "IO0003",
    kind: "IoError",
    variant: "RemoveFailed",
    message: (params) => {
      switch (params.kind) {
        case "remove-failed":
          return `cannot remove ${params.path}: ${params.reason}`;
        case "unsafe-clean":
          return `refusing to remove ${params.path}: it contains the working directory`;
      }
      return exhaustive(params);
    },
    phase: "io",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IO0003"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
