// Type tags understood by the translator. The first seven form the
// precedence lattice; the rest name collection kinds and the constructor
// return sentinel and never unify with anything.
export type Primitive = "str" | "float" | "int" | "bool";
export type TypeTag = Primitive | "auto" | "void" | "None" | "vector" | "tuple" | "set" | "constructor";

const LOWEST = 9;

// Lower rank = higher precedence.
const PRECEDENCE: Partial<Record<TypeTag, number>> = {
  str: 0,
  float: 1,
  int: 2,
  bool: 3,
  auto: LOWEST,
  void: LOWEST,
  None: LOWEST,
};

const CPP_TYPES: Record<TypeTag, string> = {
  str: "std::string",
  float: "double",
  int: "int",
  bool: "bool",
  auto: "auto",
  void: "void",
  None: "void",
  vector: "auto",
  tuple: "auto",
  set: "auto",
  constructor: "",
};

export function rank(tag : TypeTag) : number | undefined {
  return PRECEDENCE[tag];
}

/**
 * Combines two tags into the one that represents both without losing
 * precision. Tags outside the lattice, and distinct tags of equal rank,
 * give "auto".
 */
export function unify(a : TypeTag, b : TypeTag) : TypeTag {
  const ra = rank(a);
  const rb = rank(b);
  if (ra === undefined || rb === undefined) return "auto";
  if (ra === rb) return a === b ? a : "auto";
  return ra < rb ? a : b;
}

export function isPrimitive(tag : TypeTag) : tag is Primitive {
  return tag === "str" || tag === "float" || tag === "int" || tag === "bool";
}

export function isCollection(tag : TypeTag) : tag is "vector" | "tuple" | "set" {
  return tag === "vector" || tag === "tuple" || tag === "set";
}

export function cppType(tag : TypeTag) : string {
  return CPP_TYPES[tag];
}

// A mutable cell: parameter and return types sharpen as call sites and
// return statements are translated.
export class TypeSlot {
  constructor(public tag : TypeTag) {}

  unify(other : TypeTag) : TypeTag {
    this.tag = unify(this.tag, other);
    return this.tag;
  }
}
