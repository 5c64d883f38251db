import { cppType, TypeSlot, TypeTag } from "./types";

export type Dependency = "string" | "vector" | "tuple" | "unordered_set" | "iostream" | "cmath";

// Name of the function holding the script's top-level statements. Not a
// valid identifier in the source language, so it cannot collide.
export const ENTRY = "<entry>";
export const CONSTRUCTOR = "__init__";

export class Variable {
  constructor(
    public readonly name : string,
    public readonly line : number,
    public readonly type : TypeSlot,
    public readonly owner : string
  ) {}
}

export class Parameter extends Variable {
  constructor(name : string, type : TypeSlot, owner : string, public readonly defaultValue? : string) {
    super(name, -1, type, owner);
  }
}

export class Vector {
  readonly kind = "vector";
  constructor(public readonly name : string, public readonly elementType : TypeTag, public readonly line : number) {}

  typeName() : string {
    return `std::vector<${cppType(this.elementType)}>`;
  }
}

export class Tuple {
  readonly kind = "tuple";
  constructor(public readonly name : string, public readonly elementTypes : ReadonlyArray<TypeTag>, public readonly line : number) {}

  get arity() : number {
    return this.elementTypes.length;
  }

  typeName() : string {
    return `std::tuple<${this.elementTypes.map(cppType).join(", ")}>`;
  }
}

export class HashSet {
  readonly kind = "set";
  constructor(public readonly name : string, public readonly elementType : TypeTag, public readonly line : number) {}

  typeName() : string {
    return `std::unordered_set<${cppType(this.elementType)}>`;
  }
}

export type Collection = Vector | Tuple | HashSet;

export class CodeFragment {
  comment? : string;
  // Indent levels of the "}" lines emitted after this fragment.
  readonly closers : Array<number> = [];

  constructor(
    public startLine : number,
    public endLine : number,
    public endColumn : number,
    public readonly indent : number,
    public code : string,
    public readonly reason? : string
  ) {}

  covers(line : number) : boolean {
    return this.startLine <= line && line <= this.endLine;
  }
}

// Tables shared by functions and classes.
export class CollectionTables {
  readonly vectors = new Map<string, Vector>();
  readonly tuples = new Map<string, Tuple>();
  readonly sets = new Map<string, HashSet>();

  collection(name : string) : Collection | undefined {
    return this.vectors.get(name) ?? this.tuples.get(name) ?? this.sets.get(name);
  }

  addCollection(collection : Collection) : void {
    switch (collection.kind) {
      case "vector":
        this.vectors.set(collection.name, collection);
        break;
      case "tuple":
        this.tuples.set(collection.name, collection);
        break;
      case "set":
        this.sets.set(collection.name, collection);
        break;
    }
  }

  collections() : Array<Collection> {
    return [...this.vectors.values(), ...this.tuples.values(), ...this.sets.values()];
  }
}

export class FunctionSymbol extends CollectionTables {
  readonly params = new Map<string, Parameter>();
  readonly variables = new Map<string, Variable>();
  readonly returnType : TypeSlot;
  private readonly fragments = new Map<number, CodeFragment>();

  constructor(
    public readonly name : string,
    public readonly line : number,
    public readonly endLine : number,
    params : ReadonlyArray<Parameter>,
    public readonly owner? : ClassType
  ) {
    super();
    params.forEach((p) => this.params.set(p.name, p));
    this.returnType = new TypeSlot(owner !== undefined && name === CONSTRUCTOR ? "constructor" : "void");
  }

  get qualifiedName() : string {
    return this.owner === undefined ? this.name : `${this.owner.name}::${this.name}`;
  }

  get isEntry() : boolean {
    return this.name === ENTRY && this.owner === undefined;
  }

  get isConstructor() : boolean {
    return this.returnType.tag === "constructor";
  }

  // Statements sharing a start line share one fragment.
  emit(fragment : CodeFragment) : CodeFragment {
    const existing = this.fragments.get(fragment.startLine);
    if (existing === undefined) {
      this.fragments.set(fragment.startLine, fragment);
      return fragment;
    }
    existing.code = existing.code === "" ? fragment.code : `${existing.code}\n${fragment.code}`;
    if (fragment.endLine >= existing.endLine) {
      existing.endLine = fragment.endLine;
      existing.endColumn = fragment.endColumn;
    }
    existing.closers.push(...fragment.closers);
    return existing;
  }

  fragmentCovering(line : number) : CodeFragment | undefined {
    let found : CodeFragment | undefined;
    for (const fragment of this.fragments.values()) {
      if (fragment.covers(line) && (found === undefined || fragment.startLine > found.startLine)) found = fragment;
    }
    return found;
  }

  orderedFragments() : Array<CodeFragment> {
    return [...this.fragments.values()].sort((a, b) => a.startLine - b.startLine);
  }

  spans(line : number) : boolean {
    return this.line < line && line <= this.endLine;
  }
}

export class ClassType extends CollectionTables {
  readonly attributes = new Map<string, Variable>();
  readonly methods = new Map<string, FunctionSymbol>();

  constructor(
    public readonly name : string,
    public readonly bases : ReadonlyArray<string>,
    public readonly line : number,
    public readonly endLine : number
  ) {
    super();
  }
}

export type Diagnostic = { line : number, endLine : number, scope : string, reason : string };

export class TranslationUnit {
  // Qualified name → function; methods appear as "Class::method".
  readonly functions = new Map<string, FunctionSymbol>();
  readonly classes = new Map<string, ClassType>();
  readonly dependencies = new Set<Dependency>();
  readonly diagnostics : Array<Diagnostic> = [];
  readonly entry : FunctionSymbol;

  constructor(public readonly filename : string) {
    this.entry = new FunctionSymbol(ENTRY, 0, 0, []);
    this.entry.returnType.tag = "int";
    this.functions.set(ENTRY, this.entry);
  }

  require(dependency : Dependency) : void {
    this.dependencies.add(dependency);
  }

  isDefined(name : string) : boolean {
    return this.functions.has(name) || this.classes.has(name);
  }

  addClass(cls : ClassType) : boolean {
    if (this.isDefined(cls.name)) return false;
    this.classes.set(cls.name, cls);
    return true;
  }

  addFunction(fn : FunctionSymbol) : boolean {
    if (this.functions.has(fn.qualifiedName) || (fn.owner === undefined && this.classes.has(fn.name))) return false;
    this.functions.set(fn.qualifiedName, fn);
    fn.owner?.methods.set(fn.name, fn);
    return true;
  }

  freeFunction(name : string) : FunctionSymbol | undefined {
    const fn = this.functions.get(name);
    return fn === undefined || fn.isEntry ? undefined : fn;
  }
}
