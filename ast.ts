/*
Source tree consumed by the translator.

Every node carries its position in the original script:
  line     first line of the node (1-based)
  endLine  last line of the node (1-based)
  endCol   column just past the node's last character on endLine

program := <stmt>*
stmt := def <name>(<param>*): <stmt>+
      | class <name>[(<expr>*)]: <stmt>+
      | if <expr>: <stmt>+ [elif <expr>: <stmt>+]* [else: <stmt>+]?
      | while <expr>: <stmt>+
      | for <expr> in <expr>: <stmt>+
      | <expr> = <expr> | <expr> <op>= <expr>
      | return <expr>? | pass | break | continue
      | <expr>
expr := <literal> | <name> | <expr> <binop> <expr> | <expr> and|or <expr>
      | <uniop> <expr> | <expr> <cmpop> <expr> [<cmpop> <expr>]*
      | <expr>(<expr>*) | <expr>.<name> | <expr>[<expr>]
      | [<expr>*] | (<expr>*) | {<expr>*} | <expr> if <expr> else <expr>
*/

export type Pos = { line: number, endLine: number, endCol: number };

export type Literal =
  | { kind: "str", value: string, raw: string }
  | { kind: "int", value: number, raw: string }
  | { kind: "float", value: number, raw: string }
  | { kind: "bool", value: boolean, raw: string }
  | { kind: "None", value: null, raw: string }

export type Param = {
  name: string,
  kind: "plain" | "vararg" | "kwarg" | "kwonly" | "posonly",
  default?: Expr
}

export type Stmt = Pos & (
  | { tag: "function", name: string, params: Array<Param>, body: Array<Stmt> }
  | { tag: "class", name: string, bases: Array<Expr>, body: Array<Stmt> }
  // elif clauses are nested "if" nodes in orelse with elif set
  | { tag: "if", test: Expr, body: Array<Stmt>, orelse: Array<Stmt>, elif: boolean, elsePos?: { line: number, endCol: number } }
  | { tag: "while", test: Expr, body: Array<Stmt>, orelse: Array<Stmt> }
  | { tag: "for", targets: Array<Expr>, iter: Expr, body: Array<Stmt>, orelse: Array<Stmt> }
  | { tag: "assign", targets: Array<Expr>, value: Expr }
  | { tag: "aug_assign", target: Expr, op: string, value: Expr }
  | { tag: "return", value?: Expr }
  | { tag: "expr", expr: Expr }
  | { tag: "pass" }
  | { tag: "break" }
  | { tag: "continue" }
  | { tag: "unsupported", kind: string }
)

export type Expr = Pos & (
  | { tag: "literal", value: Literal }
  | { tag: "id", name: string }
  | { tag: "bin_op", op: string, left: Expr, right: Expr }
  | { tag: "bool_op", op: "and" | "or", values: Array<Expr> }
  | { tag: "uni_op", op: string, arg: Expr }
  | { tag: "compare", left: Expr, ops: Array<string>, comparators: Array<Expr> }
  | { tag: "call", func: Expr, args: Array<Expr>, keywords: boolean }
  | { tag: "attribute", value: Expr, attr: string }
  | { tag: "index", value: Expr, index: Expr, slice: boolean }
  | { tag: "list", elts: Array<Expr> }
  | { tag: "tuple", elts: Array<Expr> }
  | { tag: "set", elts: Array<Expr> }
  | { tag: "ternary", test: Expr, body: Expr, orelse: Expr }
  | { tag: "unsupported", kind: string }
)

export type StmtOf<T extends Stmt["tag"]> = Extract<Stmt, { tag: T }>;
export type ExprOf<T extends Expr["tag"]> = Extract<Expr, { tag: T }>;
