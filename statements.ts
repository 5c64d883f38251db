import { Expr, ExprOf, Stmt, StmtOf } from "./ast";
import { fail, NotTranslatable, SymbolNotFound } from "./errors";
import { Context, isSelf, Translated, translateExpr, unwrap } from "./expressions";
import { typeOf } from "./scope";
import { CodeFragment, Collection, HashSet, Tuple, Variable, Vector } from "./symbols";
import { cppType, isCollection, TypeSlot, TypeTag } from "./types";

// lines holds the whole source, indent the nesting level of the statements
// being translated.
export type BlockContext = Context & { lines: ReadonlyArray<string>, indent: number };

export function translateBlock(stmts : Array<Stmt>, ctx : BlockContext) : void {
  stmts.forEach((stmt) => translateStmt(stmt, ctx));
}

export function translateStmt(stmt : Stmt, ctx : BlockContext) : void {
  try {
    translateChecked(stmt, ctx);
  } catch (err) {
    if (err instanceof NotTranslatable) passThrough(stmt, err.reason, ctx);
    else if (err instanceof SymbolNotFound) passThrough(stmt, `'${err.symbol}' used before declaration`, ctx);
    else throw err;
  }
}

// Copies the statement's source lines as comments, the first one tagged
// with the reason it was not translated.
export function passThrough(stmt : Stmt, reason : string, ctx : BlockContext) : void {
  const source = ctx.lines.slice(stmt.line - 1, stmt.endLine);
  const margins = source.filter((l) => l.trim() !== "").map((l) => l.length - l.trimStart().length);
  const margin = margins.length === 0 ? 0 : Math.min(...margins);
  const code = source
    .map((l) => l.slice(margin).trimEnd())
    .map((l, i) => (i === 0 ? `// [${reason}] ${l}` : l === "" ? "//" : `// ${l}`))
    .join("\n");
  const fn = ctx.scope.fn;
  fn.emit(new CodeFragment(stmt.line, stmt.endLine, stmt.endCol, ctx.indent, code, reason));
  ctx.unit.diagnostics.push({ line: stmt.line, endLine: stmt.endLine, scope: fn.qualifiedName, reason });
}

function emit(pos : { line: number, endLine: number, endCol: number }, code : string, ctx : BlockContext) : void {
  ctx.scope.fn.emit(new CodeFragment(pos.line, pos.endLine, pos.endCol, ctx.indent, code));
}

// A block header runs from its keyword to the end of its last expression.
function headerPos(stmt : Stmt, last : Expr) : { line: number, endLine: number, endCol: number } {
  return last.endLine < stmt.line
    ? { line: stmt.line, endLine: stmt.line, endCol: 0 }
    : { line: stmt.line, endLine: last.endLine, endCol: last.endCol };
}

function nested(ctx : BlockContext) : BlockContext {
  return { ...ctx, indent: ctx.indent + 1 };
}

// Appends the "}" of a block to whatever fragment holds its last line.
function close(body : Array<Stmt>, ctx : BlockContext) : void {
  const last = body[body.length - 1];
  const line = last === undefined ? 0 : last.endLine;
  const fn = ctx.scope.fn;
  const fragment = fn.fragmentCovering(line) ?? fn.emit(new CodeFragment(line, line, 0, ctx.indent + 1, ""));
  fragment.closers.push(ctx.indent);
}

function translateChecked(stmt : Stmt, ctx : BlockContext) : void {
  switch (stmt.tag) {
    case "assign":
      return translateAssign(stmt, ctx);
    case "aug_assign":
      return translateAugAssign(stmt, ctx);
    case "if":
      return translateIf(stmt, ctx);
    case "while":
      return translateWhile(stmt, ctx);
    case "for":
      return translateFor(stmt, ctx);
    case "return":
      return translateReturn(stmt, ctx);
    case "expr":
      return translateExprStmt(stmt, ctx);
    case "pass":
      return emit(stmt, "", ctx);
    case "break":
      return emit(stmt, "break;", ctx);
    case "continue":
      return emit(stmt, "continue;", ctx);
    case "function":
      return fail("nested function definitions are not supported");
    case "class":
      return fail("nested class definitions are not supported");
    case "unsupported":
      return fail(stmt.kind === "syntax error" ? stmt.kind : `unsupported statement: ${stmt.kind}`);
  }
}

// The one widening allowed on reassignment is int into float.
function accepts(slot : TypeTag, value : TypeTag) : boolean {
  return slot === value || (slot === "float" && value === "int");
}

function assignable(value : Translated) : Translated {
  if (value.type === "void" || value.type === "None" || value.type === "constructor") {
    fail(`cannot assign a ${value.type} value`);
  }
  return value;
}

function collectionFrom(name : string, value : Translated, line : number, ctx : BlockContext) : Collection {
  const items = value.items;
  if (items === undefined || items.length === 0) fail(`'${name}' can only be created from a ${value.type} literal`);
  if (items.some((i) => i.type === "str")) ctx.unit.require("string");
  switch (value.type) {
    case "vector":
      ctx.unit.require("vector");
      return new Vector(name, items[0].type, line);
    case "set":
      ctx.unit.require("unordered_set");
      return new HashSet(name, items[0].type, line);
    case "tuple":
      ctx.unit.require("tuple");
      return new Tuple(name, items.map((i) => i.type), line);
    default:
      return fail(`${value.type} is not a collection`);
  }
}

function translateAssign(stmt : StmtOf<"assign">, ctx : BlockContext) : void {
  if (stmt.targets.length !== 1) fail("chained assignment is not supported");
  const target = stmt.targets[0];
  switch (target.tag) {
    case "id":
      return assignName(stmt, target.name, translateExpr(stmt.value, ctx), ctx);
    case "attribute":
      return assignAttribute(stmt, target, translateExpr(stmt.value, ctx), ctx);
    case "index":
      return assignElement(stmt, target, translateExpr(stmt.value, ctx), ctx);
    case "tuple":
    case "list":
      return fail("tuple unpacking is not supported");
    default:
      return fail("unsupported assignment target");
  }
}

function assignName(stmt : Stmt, name : string, value : Translated, ctx : BlockContext) : void {
  const fn = ctx.scope.fn;
  const existing = ctx.scope.local(name);
  if (isCollection(value.type)) {
    if (existing !== undefined) fail(`'${name}' is already defined`);
    const collection = collectionFrom(name, value, stmt.line, ctx);
    fn.addCollection(collection);
    return emit(stmt, `${collection.typeName()} ${name} = ${value.code};`, ctx);
  }
  assignable(value);
  if (existing === undefined) {
    fn.variables.set(name, new Variable(name, stmt.line, new TypeSlot(value.type), fn.qualifiedName));
    return emit(stmt, `${cppType(value.type)} ${name} = ${unwrap(value.code)};`, ctx);
  }
  if (existing.kind === "collection") fail(`'${name}' is a ${existing.collection.kind} and cannot be reassigned`);
  const current = existing.variable.type.tag;
  if (!accepts(current, value.type)) fail(`cannot assign a ${value.type} value to '${name}' of type ${current}`);
  emit(stmt, `${name} = ${unwrap(value.code)};`, ctx);
}

function assignAttribute(stmt : Stmt, target : ExprOf<"attribute">, value : Translated, ctx : BlockContext) : void {
  const cls = ctx.scope.cls;
  if (cls === undefined || !isSelf(target.value, ctx.scope)) fail("attributes can only be assigned on self inside a method");
  const name = target.attr;
  const existing = ctx.scope.member(name);
  if (isCollection(value.type)) {
    if (existing !== undefined) fail(`'self.${name}' is already defined`);
    cls.addCollection(collectionFrom(name, value, stmt.line, ctx));
    return emit(stmt, `this->${name} = ${value.code};`, ctx);
  }
  assignable(value);
  if (existing === undefined) {
    cls.attributes.set(name, new Variable(name, stmt.line, new TypeSlot(value.type), cls.name));
  } else if (existing.kind === "collection") {
    fail(`'self.${name}' is a ${existing.collection.kind} and cannot be reassigned`);
  } else if (!accepts(existing.variable.type.tag, value.type)) {
    fail(`cannot assign a ${value.type} value to 'self.${name}' of type ${existing.variable.type.tag}`);
  }
  emit(stmt, `this->${name} = ${unwrap(value.code)};`, ctx);
}

function assignElement(stmt : Stmt, target : ExprOf<"index">, value : Translated, ctx : BlockContext) : void {
  const base = target.value;
  const resolved = base.tag === "attribute" && isSelf(base.value, ctx.scope)
    ? ctx.scope.member(base.attr)
    : base.tag === "id" ? ctx.scope.lookup(base.name) : undefined;
  if (resolved === undefined || resolved.kind !== "collection" || resolved.collection.kind !== "vector") {
    fail("only vector elements can be assigned");
  }
  const element = translateExpr(target, ctx);
  assignable(value);
  if (!accepts(element.type, value.type)) fail(`cannot store a ${value.type} value in a vector of ${element.type}`);
  emit(stmt, `${element.code} = ${unwrap(value.code)};`, ctx);
}

function translateAugAssign(stmt : StmtOf<"aug_assign">, ctx : BlockContext) : void {
  const target = stmt.target;
  const combined : Expr = {
    line: stmt.line, endLine: stmt.endLine, endCol: stmt.endCol,
    tag: "bin_op", op: stmt.op, left: target, right: stmt.value
  };
  const value = translateExpr(combined, ctx);
  switch (target.tag) {
    case "id": {
      const existing = ctx.scope.local(target.name);
      if (existing === undefined) fail(`'${target.name}' used before declaration`);
      return assignName(stmt, target.name, value, ctx);
    }
    case "attribute":
      return assignAttribute(stmt, target, value, ctx);
    case "index":
      return assignElement(stmt, target, value, ctx);
    default:
      return fail("unsupported assignment target");
  }
}

function translateIf(stmt : StmtOf<"if">, ctx : BlockContext) : void {
  // Every test of the chain is checked before anything is emitted.
  const clauses : Array<{ node: StmtOf<"if">, test: Translated }> = [];
  let node : StmtOf<"if"> = stmt;
  let orelse : Array<Stmt> = [];
  for (;;) {
    clauses.push({ node, test: translateExpr(node.test, ctx) });
    const next = node.orelse[0];
    if (node.orelse.length === 1 && next.tag === "if" && next.elif) {
      node = next;
      continue;
    }
    orelse = node.orelse;
    break;
  }
  const elsePos = node.elsePos;
  if (orelse.length > 0 && elsePos === undefined) fail("else clause without a position");

  const inner = nested(ctx);
  clauses.forEach(({ node: clause, test }, i) => {
    const header = i === 0 ? `if (${unwrap(test.code)}) {` : `} else if (${unwrap(test.code)}) {`;
    emit(headerPos(clause, clause.test), header, ctx);
    translateBlock(clause.body, inner);
  });
  if (orelse.length > 0 && elsePos !== undefined) {
    emit({ line: elsePos.line, endLine: elsePos.line, endCol: elsePos.endCol }, "} else {", ctx);
    translateBlock(orelse, inner);
    return close(orelse, ctx);
  }
  close(node.body, ctx);
}

function translateWhile(stmt : StmtOf<"while">, ctx : BlockContext) : void {
  if (stmt.orelse.length > 0) fail("while-else is not supported");
  const test = translateExpr(stmt.test, ctx);
  emit(headerPos(stmt, stmt.test), `while (${unwrap(test.code)}) {`, ctx);
  translateBlock(stmt.body, nested(ctx));
  close(stmt.body, ctx);
}

type Bounds = { start: string, stop: string, step?: Expr, stepCode: string };

function literalInt(expr : Expr) : number | undefined {
  if (expr.tag === "literal" && expr.value.kind === "int") return expr.value.value;
  if (expr.tag === "uni_op" && expr.op === "-" && expr.arg.tag === "literal" && expr.arg.value.kind === "int") {
    return -expr.arg.value.value;
  }
  return undefined;
}

function rangeBounds(iter : Expr, ctx : BlockContext) : Bounds {
  const count = literalInt(iter);
  if (count !== undefined) {
    if (count < 0) fail("cannot iterate over a negative count");
    return { start: "0", stop: String(count), stepCode: "1" };
  }
  if (iter.tag !== "call" || iter.func.tag !== "id" || iter.func.name !== "range" || ctx.unit.freeFunction("range") !== undefined) {
    fail("only range() loops are supported");
  }
  if (iter.keywords) fail("keyword and starred arguments are not supported");
  if (iter.args.length < 1 || iter.args.length > 3) fail(`range() takes 1 to 3 arguments but ${iter.args.length} were given`);
  const args = iter.args.map((a) => translateExpr(a, ctx));
  args.forEach((a) => {
    if (a.type !== "int" && a.type !== "auto") fail(`range() arguments must be int, not ${a.type}`);
  });
  const codes = args.map((a) => unwrap(a.code));
  if (codes.length === 1) return { start: "0", stop: codes[0], stepCode: "1" };
  return { start: codes[0], stop: codes[1], step: iter.args[2], stepCode: codes[2] ?? "1" };
}

function translateFor(stmt : StmtOf<"for">, ctx : BlockContext) : void {
  if (stmt.orelse.length > 0) fail("for-else is not supported");
  const target = stmt.targets[0];
  if (stmt.targets.length !== 1 || target.tag !== "id") fail("loop target must be a single name");
  const name = target.name;
  const { start, stop, step, stepCode } = rangeBounds(stmt.iter, ctx);

  const fn = ctx.scope.fn;
  const existing = ctx.scope.local(name);
  if (existing !== undefined && (existing.kind === "collection" || typeOf(existing) !== "int")) {
    fail(`loop variable '${name}' is already defined as ${typeOf(existing)}`);
  }
  const init = existing === undefined ? `int ${name} = ${start}` : `${name} = ${start}`;

  const literalStep = step === undefined ? 1 : literalInt(step);
  let condition : string;
  let update : string;
  if (literalStep === 0) fail("range() step must not be zero");
  if (literalStep === undefined) {
    condition = `(${stepCode} > 0 ? ${name} < ${stop} : ${name} > ${stop})`;
    update = `${name} += ${stepCode}`;
  } else {
    condition = literalStep > 0 ? `${name} < ${stop}` : `${name} > ${stop}`;
    update = literalStep === 1 ? `${name}++` : literalStep === -1 ? `${name}--` : `${name} += ${stepCode}`;
  }

  if (existing === undefined) fn.variables.set(name, new Variable(name, stmt.line, new TypeSlot("int"), fn.qualifiedName));
  emit(headerPos(stmt, stmt.iter), `for (${init}; ${condition}; ${update}) {`, ctx);
  translateBlock(stmt.body, nested(ctx));
  // A variable declared in the header ends with the loop.
  if (existing === undefined) fn.variables.delete(name);
  close(stmt.body, ctx);
}

function isNoneLiteral(expr : Expr) : boolean {
  return expr.tag === "literal" && expr.value.kind === "None";
}

function translateReturn(stmt : StmtOf<"return">, ctx : BlockContext) : void {
  const fn = ctx.scope.fn;
  if (fn.isEntry) fail("'return' outside a function");
  if (stmt.value === undefined || isNoneLiteral(stmt.value)) return emit(stmt, "return;", ctx);
  if (fn.isConstructor) fail("constructors cannot return a value");
  const value = translateExpr(stmt.value, ctx);
  if (isCollection(value.type)) fail(`returning a ${value.type} is not supported`);
  assignable(value);
  fn.returnType.unify(value.type);
  emit(stmt, `return ${unwrap(value.code)};`, ctx);
}

// A bare triple-quoted string documents the code around it.
function blockComment(text : string) : string {
  const lines = text.replace(/\*\//g, "* /").split("\n").map((l) => l.trim());
  while (lines.length > 0 && lines[0] === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  if (lines.length <= 1) return `/* ${lines.join("")} */`;
  return ["/*", ...lines, "*/"].join("\n");
}

function translateExprStmt(stmt : StmtOf<"expr">, ctx : BlockContext) : void {
  const expr = stmt.expr;
  if (expr.tag === "call") return emit(stmt, `${translateExpr(expr, ctx).code};`, ctx);
  if (expr.tag === "literal" && expr.value.kind === "str" && /^[a-zA-Z]*("""|''')/.test(expr.value.raw)) {
    return emit(stmt, blockComment(expr.value.value), ctx);
  }
  fail("expression has no effect");
}
