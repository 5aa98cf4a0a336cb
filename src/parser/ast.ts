import type { SourceSpan } from "../diagnostics/index.js";

/** Identity of a syntax node. Semantic passes key their side-tables by it. */
export type NodeId = number;

interface NodeBase {
  readonly id: NodeId;
  readonly span: SourceSpan;
}

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

export type UnaryOperator = "-" | "!";

export interface Program extends NodeBase {
  readonly kind: "Program";
  readonly file: string;
  readonly items: readonly Item[];
}

export interface FunctionDecl extends NodeBase {
  readonly kind: "FunctionDecl";
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly params: readonly Param[];
  readonly returnType?: TypeRef;
  readonly body: Block;
}

export interface Param extends NodeBase {
  readonly kind: "Param";
  readonly name: string;
  readonly type: TypeRef;
}

export interface TypeRef extends NodeBase {
  readonly kind: "TypeRef";
  readonly name: string;
}

export interface VarDecl extends NodeBase {
  readonly kind: "VarDecl";
  readonly mutable: boolean;
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly type?: TypeRef;
  readonly initializer: Expr;
}

export interface Block extends NodeBase {
  readonly kind: "Block";
  readonly statements: readonly Stmt[];
}

export interface If extends NodeBase {
  readonly kind: "If";
  readonly condition: Expr;
  readonly thenBranch: Block;
  readonly elseBranch?: Block | If;
}

export interface While extends NodeBase {
  readonly kind: "While";
  readonly condition: Expr;
  readonly body: Block;
}

export interface Return extends NodeBase {
  readonly kind: "Return";
  readonly value?: Expr;
}

export interface Assignment extends NodeBase {
  readonly kind: "Assignment";
  readonly target: Identifier;
  readonly value: Expr;
}

export interface ExpressionStatement extends NodeBase {
  readonly kind: "ExpressionStatement";
  readonly expression: Expr;
}

export interface BinaryExpr extends NodeBase {
  readonly kind: "BinaryExpr";
  readonly operator: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
}

export interface UnaryExpr extends NodeBase {
  readonly kind: "UnaryExpr";
  readonly operator: UnaryOperator;
  readonly operand: Expr;
}

export interface Call extends NodeBase {
  readonly kind: "Call";
  readonly callee: Expr;
  readonly args: readonly Expr[];
}

export type LiteralValue =
  | { readonly type: "Int"; readonly value: bigint }
  | { readonly type: "Bool"; readonly value: boolean }
  | { readonly type: "String"; readonly value: string };

export interface Literal extends NodeBase {
  readonly kind: "Literal";
  readonly value: LiteralValue;
}

export interface Identifier extends NodeBase {
  readonly kind: "Identifier";
  readonly name: string;
}

export type Item = FunctionDecl | VarDecl;

export type Stmt =
  | VarDecl
  | Block
  | If
  | While
  | Return
  | Assignment
  | ExpressionStatement;

export type Expr = BinaryExpr | UnaryExpr | Call | Literal | Identifier;

export type Node = Program | Item | Stmt | Expr | Param | TypeRef;

/** Direct children of a node, in source order. */
export const childrenOf = (node: Node): Node[] => {
  switch (node.kind) {
    case "Program":
      return [...node.items];
    case "FunctionDecl":
      return [
        ...node.params,
        ...(node.returnType ? [node.returnType] : []),
        node.body,
      ];
    case "Param":
      return [node.type];
    case "TypeRef":
      return [];
    case "VarDecl":
      return [...(node.type ? [node.type] : []), node.initializer];
    case "Block":
      return [...node.statements];
    case "If":
      return [
        node.condition,
        node.thenBranch,
        ...(node.elseBranch ? [node.elseBranch] : []),
      ];
    case "While":
      return [node.condition, node.body];
    case "Return":
      return node.value ? [node.value] : [];
    case "Assignment":
      return [node.target, node.value];
    case "ExpressionStatement":
      return [node.expression];
    case "BinaryExpr":
      return [node.left, node.right];
    case "UnaryExpr":
      return [node.operand];
    case "Call":
      return [node.callee, ...node.args];
    case "Literal":
    case "Identifier":
      return [];
  }
};

/** Pre-order traversal of a syntax tree. */
export const walk = (node: Node, visit: (node: Node) => void): void => {
  visit(node);
  childrenOf(node).forEach((child) => walk(child, visit));
};

export const isExpr = (node: Node): node is Expr =>
  node.kind === "BinaryExpr" ||
  node.kind === "UnaryExpr" ||
  node.kind === "Call" ||
  node.kind === "Literal" ||
  node.kind === "Identifier";
