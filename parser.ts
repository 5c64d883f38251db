import { parser } from "lezer-python";
import { TreeCursor } from "lezer-tree";
import { Expr, Literal, Param, Pos, Stmt } from "./ast";

// Plain copy of a lezer node, taken once so conversion can look ahead freely.
type Node = { name: string, from: number, to: number, children: Array<Node> };

const ERROR_NODE = "⚠";

const KEYWORDS = new Set([
  "if", "elif", "else", "while", "for", "in", "def", "class", "return", "pass",
  "break", "continue", "and", "or", "not", "is", "lambda", "async", "await",
  "from", "import", "as", "global", "nonlocal", "del", "try", "except",
  "finally", "with", "raise", "assert", "yield",
]);

// Nodes that carry no value of their own: operators, keywords, brackets.
const OPERATOR_NODES = new Set([
  "AssignOp", "UpdateOp", "ArithOp", "BitOp", "CompareOp", "TypeDef", "Comment",
]);

const COMPOUND = new Set([
  "Body", "IfStatement", "WhileStatement", "ForStatement", "FunctionDefinition",
  "ClassDefinition", "TryStatement", "WithStatement", "DecoratedStatement",
]);

const COMPARE_OPS = new Set(["<", ">", "==", "!=", "<=", ">=", "<>", "in", "not in", "is", "is not"]);

const EXPRESSION_KINDS: Record<string, string> = {
  LambdaExpression: "lambda",
  DictionaryExpression: "dictionary",
  ArrayComprehensionExpression: "list comprehension",
  SetComprehensionExpression: "set comprehension",
  DictionaryComprehensionExpression: "dictionary comprehension",
  ComprehensionExpression: "generator",
  FormatString: "f-string",
  AwaitExpression: "await",
  YieldExpression: "yield",
  Ellipsis: "ellipsis",
};

//This function uses the lezer-python library to parse the source code and converts the tree.
export function parse(source : string) : Array<Stmt> {
  const t = parser.parse(source);
  const script = copyTree(t.cursor());
  return new Converter(source).script(script);
}

function copyTree(c : TreeCursor) : Node {
  const node: Node = { name: c.type.name, from: c.from, to: c.to, children: [] };
  if (c.firstChild()) {
    do {
      node.children.push(copyTree(c));
    } while (c.nextSibling());
    c.parent();
  }
  return node;
}

function isMeaningful(node : Node) : boolean {
  if (node.name === ERROR_NODE) return true;
  if (OPERATOR_NODES.has(node.name) || KEYWORDS.has(node.name)) return false;
  return /\w/.test(node.name);
}

function meaningful(node : Node) : Array<Node> {
  return node.children.filter(isMeaningful);
}

function normalizeOp(text : string) : string {
  return text.replace(/#[^\n]*/g, "").replace(/[()\\]/g, " ").replace(/\s+/g, " ").trim();
}

class Converter {
  private readonly lineStarts: Array<number> = [0];

  constructor(private readonly source : string) {
    for (let i = 0; i < source.length; i++) {
      if (source[i] === "\n") this.lineStarts.push(i + 1);
    }
  }

  script(node : Node) : Array<Stmt> {
    return meaningful(node).map((n) => this.stmt(n));
  }

  private text(from : number, to : number) : string {
    return this.source.substring(from, to);
  }

  private lineOf(offset : number) : number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  private trimEnd(from : number, to : number) : number {
    while (to > from && /\s/.test(this.source[to - 1])) to--;
    return to;
  }

  // Compound nodes end at their last statement, not at the dedent that closes them.
  private endOf(node : Node) : number {
    if (COMPOUND.has(node.name)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child.name === "Comment" || child.from === child.to) continue;
        return this.endOf(child);
      }
    }
    // A comment closing a simple statement is not part of it.
    let to = node.to;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child.name !== "Comment" && this.text(child.from, child.to).trim() !== "") break;
      to = Math.min(to, child.from);
    }
    return this.trimEnd(node.from, to);
  }

  private pos(node : Node) : Pos {
    const end = this.endOf(node);
    const endLine = this.lineOf(end);
    return { line: this.lineOf(node.from), endLine, endCol: end - this.lineStarts[endLine - 1] };
  }

  private unsupportedStmt(node : Node) : Stmt {
    const kind = node.name === ERROR_NODE ? "syntax error" : node.name.replace(/Statement$/, "").toLowerCase();
    return { ...this.pos(node), tag: "unsupported", kind };
  }

  private body(node : Node | undefined) : Array<Stmt> {
    if (node === undefined || node.name !== "Body") return [];
    return meaningful(node).map((n) => this.stmt(n));
  }

  private keywordBefore(node : Node, keyword : string, before : number, after : number) : Node | undefined {
    return node.children.find((c) => c.name === keyword && c.from < before && c.from >= after);
  }

  //Function to convert statements in the program
  stmt(node : Node) : Stmt {
    switch (node.name) {
      case "FunctionDefinition":
        return this.functionDef(node);
      case "ClassDefinition":
        return this.classDef(node);
      case "IfStatement":
        return this.ifStatement(node);
      case "WhileStatement": {
        const [test, body, orelse] = meaningful(node);
        if (test === undefined || body === undefined) return this.unsupportedStmt(node);
        return {
          ...this.pos(node), tag: "while",
          test: this.expr(test), body: this.body(body), orelse: this.body(orelse)
        };
      }
      case "ForStatement":
        return this.forStatement(node);
      case "AssignStatement":
        return this.assign(node);
      case "UpdateStatement": {
        const [target, value] = meaningful(node);
        if (target === undefined || value === undefined) return this.unsupportedStmt(node);
        const op = normalizeOp(this.text(target.to, value.from)).replace(/=$/, "");
        return { ...this.pos(node), tag: "aug_assign", target: this.expr(target), op, value: this.expr(value) };
      }
      case "ReturnStatement": {
        const values = meaningful(node);
        return { ...this.pos(node), tag: "return", value: values.length === 0 ? undefined : this.exprList(values, node) };
      }
      case "ExpressionStatement":
        return { ...this.pos(node), tag: "expr", expr: this.exprList(meaningful(node), node) };
      case "PassStatement":
        return { ...this.pos(node), tag: "pass" };
      case "BreakStatement":
        return { ...this.pos(node), tag: "break" };
      case "ContinueStatement":
        return { ...this.pos(node), tag: "continue" };
      default:
        return this.unsupportedStmt(node);
    }
  }

  private functionDef(node : Node) : Stmt {
    const parts = meaningful(node);
    const name = parts.find((p) => p.name === "VariableName");
    const paramList = parts.find((p) => p.name === "ParamList");
    const body = parts.find((p) => p.name === "Body");
    if (name === undefined || paramList === undefined || body === undefined) return this.unsupportedStmt(node);
    return {
      ...this.pos(node), tag: "function",
      name: this.text(name.from, name.to),
      params: this.params(paramList),
      body: this.body(body)
    };
  }

  // Separators between parameters only show up in the text between nodes.
  private params(list : Node) : Array<Param> {
    const params: Array<Param> = [];
    let prevEnd = list.from;
    let keywordOnly = false;
    for (const child of meaningful(list)) {
      const gap = this.text(prevEnd, child.from);
      prevEnd = child.to;
      const last = params[params.length - 1];
      if ((child.name === "VariableName" || child.name === "self") && !/=\s*$/.test(gap)) {
        if (/\//.test(gap) && last !== undefined) {
          params.forEach((p) => { p.kind = "posonly"; });
        }
        let kind: Param["kind"] = keywordOnly ? "kwonly" : "plain";
        if (/\*\*\s*$/.test(gap)) kind = "kwarg";
        else if (/\*\s*$/.test(gap)) { kind = "vararg"; keywordOnly = true; }
        else if (/\*/.test(gap)) { keywordOnly = true; kind = "kwonly"; }
        params.push({ name: this.text(child.from, child.to), kind });
      } else if (last !== undefined) {
        last.default = this.expr(child);
      }
    }
    if (/\//.test(this.text(prevEnd, list.to))) params.forEach((p) => { p.kind = "posonly"; });
    return params;
  }

  private classDef(node : Node) : Stmt {
    const parts = meaningful(node);
    const name = parts.find((p) => p.name === "VariableName");
    const argList = parts.find((p) => p.name === "ArgList");
    const body = parts.find((p) => p.name === "Body");
    if (name === undefined || body === undefined) return this.unsupportedStmt(node);
    return {
      ...this.pos(node), tag: "class",
      name: this.text(name.from, name.to),
      bases: argList === undefined ? [] : this.args(argList).args,
      body: this.body(body)
    };
  }

  private ifStatement(node : Node) : Stmt {
    const parts = meaningful(node);
    const clauses: Array<{ test: Node, body: Node }> = [];
    let elseBody: Node | undefined;
    for (let i = 0; i < parts.length; i++) {
      if (parts[i].name === "Body") {
        elseBody = parts[i];
      } else {
        clauses.push({ test: parts[i], body: parts[i + 1] });
        i++;
      }
    }
    const { endLine, endCol } = this.pos(node);
    let orelse: Array<Stmt> = this.body(elseBody);
    let elsePos = elseBody === undefined ? undefined : {
      line: this.lineOf(elseBody.from),
      endCol: elseBody.from + 1 - this.lineStarts[this.lineOf(elseBody.from) - 1]
    };
    for (let i = clauses.length - 1; i >= 1; i--) {
      const clause = clauses[i];
      const keyword = this.keywordBefore(node, "elif", clause.test.from, clauses[i - 1].test.to);
      const elifStmt: Stmt = {
        line: this.lineOf(keyword === undefined ? clause.test.from : keyword.from), endLine, endCol,
        tag: "if", elif: true,
        test: this.expr(clause.test), body: this.body(clause.body), orelse, elsePos
      };
      orelse = [elifStmt];
      elsePos = undefined;
    }
    if (clauses.length === 0) return this.unsupportedStmt(node);
    return {
      ...this.pos(node), tag: "if", elif: false,
      test: this.expr(clauses[0].test), body: this.body(clauses[0].body), orelse, elsePos
    };
  }

  private forStatement(node : Node) : Stmt {
    const inKeyword = node.children.find((c) => c.name === "in");
    const parts = meaningful(node);
    const bodies = parts.filter((p) => p.name === "Body");
    const heads = parts.filter((p) => p.name !== "Body");
    let targets: Array<Node>;
    let iters: Array<Node>;
    if (inKeyword === undefined) {
      targets = heads.slice(0, 1);
      iters = heads.slice(1);
    } else {
      targets = heads.filter((p) => p.to <= inKeyword.from);
      iters = heads.filter((p) => p.from >= inKeyword.to);
    }
    if (targets.length === 0 || iters.length === 0 || bodies.length === 0) return this.unsupportedStmt(node);
    return {
      ...this.pos(node), tag: "for",
      targets: targets.map((t) => this.expr(t)),
      iter: this.exprList(iters, node),
      body: this.body(bodies[0]),
      orelse: this.body(bodies[1])
    };
  }

  //name = value, a = b = value, x: int = value
  private assign(node : Node) : Stmt {
    const segments: Array<Array<Node>> = [[]];
    let prevEnd = node.from;
    for (const child of meaningful(node)) {
      if (/(^|[^=!<>])=($|[^=])/.test(this.text(prevEnd, child.from)) && segments[segments.length - 1].length > 0) {
        segments.push([]);
      }
      segments[segments.length - 1].push(child);
      prevEnd = child.to;
    }
    if (segments.length < 2) return this.unsupportedStmt(node);
    const value = segments[segments.length - 1];
    return {
      ...this.pos(node), tag: "assign",
      targets: segments.slice(0, -1).map((s) => this.exprList(s, node)),
      value: this.exprList(value, node)
    };
  }

  // Comma-separated expressions without brackets form a tuple.
  private exprList(nodes : Array<Node>, parent : Node) : Expr {
    if (nodes.length === 1) return this.expr(nodes[0]);
    if (nodes.length === 0) return { ...this.exprPos(parent), tag: "unsupported", kind: "empty expression" };
    const first = this.exprPos(nodes[0]);
    const last = this.exprPos(nodes[nodes.length - 1]);
    return {
      line: first.line, endLine: last.endLine, endCol: last.endCol,
      tag: "tuple", elts: nodes.map((n) => this.expr(n))
    };
  }

  private exprPos(node : Node) : Pos {
    const end = this.trimEnd(node.from, node.to);
    const endLine = this.lineOf(end);
    return { line: this.lineOf(node.from), endLine, endCol: end - this.lineStarts[endLine - 1] };
  }

  private args(list : Node) : { args: Array<Expr>, keywords: boolean } {
    const args: Array<Expr> = [];
    let keywords = false;
    let prevEnd = list.from;
    for (const child of meaningful(list)) {
      const gap = this.text(prevEnd, child.from);
      prevEnd = child.to;
      if (/\*/.test(gap)) {
        keywords = true;
        args.push({ ...this.exprPos(child), tag: "unsupported", kind: "starred argument" });
      } else if (/(^|[^=!<>])=($|[^=])/.test(gap)) {
        keywords = true;
        args[args.length - 1] = { ...this.exprPos(child), tag: "unsupported", kind: "keyword argument" };
      } else {
        args.push(this.expr(child));
      }
    }
    return { args, keywords };
  }

  //Function to convert expressions
  expr(node : Node) : Expr {
    const pos = this.exprPos(node);
    const text = this.text(node.from, node.to);
    switch (node.name) {
      case "Number":
        return { ...pos, tag: "literal", value: this.number(text) };
      case "String":
      case "ContinuedString":
        if (/^[a-zA-Z]*[fF]/.test(text)) return { ...pos, tag: "unsupported", kind: "f-string" };
        if (/^[a-zA-Z]*[bB]/.test(text)) return { ...pos, tag: "unsupported", kind: "bytes literal" };
        if (!/^[a-zA-Z]*[rR]/.test(text) && NAMED_ESCAPE.test(text)) {
          return { ...pos, tag: "unsupported", kind: "named unicode escape" };
        }
        return { ...pos, tag: "literal", value: this.string(node) };
      case "Boolean":
        return { ...pos, tag: "literal", value: { kind: "bool", value: text === "True", raw: text } };
      case "None":
        return { ...pos, tag: "literal", value: { kind: "None", value: null, raw: text } };
      case "VariableName":
      case "self":
        return this.name(pos, text);
      case "ParenthesizedExpression": {
        const inner = meaningful(node);
        if (inner.length !== 1) return { ...pos, tag: "unsupported", kind: "parenthesized expression" };
        return this.expr(inner[0]);
      }
      case "UnaryExpression": {
        const operand = meaningful(node).pop();
        if (operand === undefined) return { ...pos, tag: "unsupported", kind: "unary expression" };
        return { ...pos, tag: "uni_op", op: normalizeOp(this.text(node.from, operand.from)), arg: this.expr(operand) };
      }
      case "BinaryExpression":
        return this.binary(node, pos);
      case "CallExpression": {
        const [callee, argList] = meaningful(node);
        if (callee === undefined || argList === undefined) return { ...pos, tag: "unsupported", kind: "call" };
        const { args, keywords } = this.args(argList);
        return { ...pos, tag: "call", func: this.expr(callee), args, keywords };
      }
      case "MemberExpression":
        return this.member(node, pos);
      case "ArrayExpression":
        return { ...pos, tag: "list", elts: meaningful(node).map((n) => this.expr(n)) };
      case "TupleExpression":
        return { ...pos, tag: "tuple", elts: meaningful(node).map((n) => this.expr(n)) };
      case "SetExpression":
        return { ...pos, tag: "set", elts: meaningful(node).map((n) => this.expr(n)) };
      case "ConditionalExpression": {
        const [body, test, orelse] = meaningful(node);
        if (orelse === undefined) return { ...pos, tag: "unsupported", kind: "conditional expression" };
        return { ...pos, tag: "ternary", test: this.expr(test), body: this.expr(body), orelse: this.expr(orelse) };
      }
      default:
        if (text === "True" || text === "False") {
          return { ...pos, tag: "literal", value: { kind: "bool", value: text === "True", raw: text } };
        }
        if (text === "None") return { ...pos, tag: "literal", value: { kind: "None", value: null, raw: text } };
        return { ...pos, tag: "unsupported", kind: EXPRESSION_KINDS[node.name] ?? (node.name === ERROR_NODE ? "syntax error" : node.name) };
    }
  }

  private name(pos : Pos, text : string) : Expr {
    if (text === "True" || text === "False") {
      return { ...pos, tag: "literal", value: { kind: "bool", value: text === "True", raw: text } };
    }
    if (text === "None") return { ...pos, tag: "literal", value: { kind: "None", value: null, raw: text } };
    return { ...pos, tag: "id", name: text };
  }

  // a < b < c and a and b and c are flattened; parenthesized operands keep their grouping.
  private binary(node : Node, pos : Pos) : Expr {
    const parts = meaningful(node);
    const left = parts[0];
    const right = parts[parts.length - 1];
    if (parts.length < 2) return { ...pos, tag: "unsupported", kind: "binary expression" };
    const op = normalizeOp(this.text(left.to, right.from));
    const lhs = this.expr(left);
    const rhs = this.expr(right);
    if (op === "and" || op === "or") {
      const values = left.name === "BinaryExpression" && lhs.tag === "bool_op" && lhs.op === op ? [...lhs.values, rhs] : [lhs, rhs];
      return { ...pos, tag: "bool_op", op, values };
    }
    if (COMPARE_OPS.has(op)) {
      if (left.name === "BinaryExpression" && lhs.tag === "compare") {
        return { ...pos, tag: "compare", left: lhs.left, ops: [...lhs.ops, op], comparators: [...lhs.comparators, rhs] };
      }
      return { ...pos, tag: "compare", left: lhs, ops: [op], comparators: [rhs] };
    }
    return { ...pos, tag: "bin_op", op, left: lhs, right: rhs };
  }

  private member(node : Node, pos : Pos) : Expr {
    const [object, ...rest] = meaningful(node);
    if (object === undefined) return { ...pos, tag: "unsupported", kind: "member expression" };
    const property = rest.find((r) => r.name === "PropertyName");
    if (property !== undefined) {
      return { ...pos, tag: "attribute", value: this.expr(object), attr: this.text(property.from, property.to) };
    }
    const brackets = this.text(object.to, node.to);
    if (rest.length !== 1) {
      return { ...pos, tag: "index", value: this.expr(object), index: { ...pos, tag: "unsupported", kind: "slice" }, slice: true };
    }
    const outside = brackets.replace(this.text(rest[0].from, rest[0].to), "");
    return { ...pos, tag: "index", value: this.expr(object), index: this.expr(rest[0]), slice: outside.includes(":") };
  }

  private number(text : string) : Literal {
    const raw = text.replace(/_/g, "");
    if (/^0[xob]/i.test(raw)) return { kind: "int", value: Number(raw), raw };
    if (/[jJ]$/.test(raw)) return { kind: "float", value: NaN, raw };
    if (/[.eE]/.test(raw)) return { kind: "float", value: Number(raw), raw };
    return { kind: "int", value: Number(raw), raw };
  }

  private string(node : Node) : Literal {
    const raw = this.text(node.from, node.to);
    const parts = node.name === "ContinuedString" ? meaningful(node) : [node];
    let value = "";
    for (const part of parts.length > 0 ? parts : [node]) {
      value += unquote(this.text(part.from, part.to));
    }
    return { kind: "str", value, raw };
  }
}

const ESCAPES: Record<string, string> = {
  n: "\n", t: "\t", r: "\r", a: "\x07", b: "\b", f: "\f", v: "\v", "\\": "\\", "'": "'", "\"": "\""
};

const ESCAPE = /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|.)/gs;

// \N{...} needs the Unicode name table.
const NAMED_ESCAPE = /(^|[^\\])(\\\\)*\\N\{/;

function unquote(token : string) : string {
  const prefix = /^[a-zA-Z]*/.exec(token)?.[0] ?? "";
  let body = token.slice(prefix.length);
  const quote = body.startsWith("\"\"\"") || body.startsWith("'''") ? body.slice(0, 3) : body.slice(0, 1);
  body = body.slice(quote.length, body.length - quote.length);
  if (/r/i.test(prefix)) return body;
  return body.replace(ESCAPE, (all, esc: string) => {
    if (esc === "\n") return "";
    if (/^[xuU]./.test(esc)) {
      const code = parseInt(esc.slice(1), 16);
      return code > 0x10ffff ? all : String.fromCodePoint(code);
    }
    if (/^[0-7]+$/.test(esc)) return String.fromCodePoint(parseInt(esc, 8));
    return ESCAPES[esc] ?? all;
  });
}
