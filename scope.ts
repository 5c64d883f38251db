import { SymbolNotFound } from "./errors";
import { ClassType, Collection, CollectionTables, FunctionSymbol, Parameter, Variable } from "./symbols";
import { TypeTag } from "./types";

export type Resolved =
  | { kind: "attribute", variable: Variable }
  | { kind: "parameter", variable: Parameter }
  | { kind: "variable", variable: Variable }
  | { kind: "collection", collection: Collection, member: boolean }

export function typeOf(resolved : Resolved) : TypeTag {
  return resolved.kind === "collection" ? resolved.collection.kind : resolved.variable.type.tag;
}

function collectionIn(tables : CollectionTables, name : string, member : boolean) : Resolved | undefined {
  const collection : Collection | undefined = tables.collection(name);
  return collection === undefined ? undefined : { kind: "collection", collection, member };
}

// Lookup inside one function body; methods see their class's members first.
export class Scope {
  constructor(public readonly fn : FunctionSymbol) {}

  get cls() : ClassType | undefined {
    return this.fn.owner;
  }

  lookup(name : string) : Resolved {
    const found = (this.cls === undefined ? undefined : this.member(name)) ?? this.local(name);
    if (found === undefined) throw new SymbolNotFound(name);
    return found;
  }

  // Class attributes, then class vectors, tuples and sets.
  member(name : string) : Resolved | undefined {
    const cls = this.cls;
    if (cls === undefined) return undefined;
    const attribute = cls.attributes.get(name);
    if (attribute !== undefined) return { kind: "attribute", variable: attribute };
    return collectionIn(cls, name, true);
  }

  // Parameters, then locals, then vectors, tuples and sets.
  local(name : string) : Resolved | undefined {
    const param = this.fn.params.get(name);
    if (param !== undefined) return { kind: "parameter", variable: param };
    const variable = this.fn.variables.get(name);
    if (variable !== undefined) return { kind: "variable", variable };
    return collectionIn(this.fn, name, false);
  }

  // Subscript bases: vectors, tuples and sets, then variables, then parameters.
  indexable(name : string) : Resolved {
    const cls = this.cls;
    const tables : Array<[CollectionTables, boolean]> = cls === undefined ? [[this.fn, false]] : [[this.fn, false], [cls, true]];
    for (const [t, member] of tables) {
      const vector = t.vectors.get(name);
      if (vector !== undefined) return { kind: "collection", collection: vector, member };
    }
    for (const [t, member] of tables) {
      const tuple = t.tuples.get(name);
      if (tuple !== undefined) return { kind: "collection", collection: tuple, member };
    }
    for (const [t, member] of tables) {
      const hashSet = t.sets.get(name);
      if (hashSet !== undefined) return { kind: "collection", collection: hashSet, member };
    }
    const variable = this.fn.variables.get(name);
    if (variable !== undefined) return { kind: "variable", variable };
    const attribute = cls?.attributes.get(name);
    if (attribute !== undefined) return { kind: "attribute", variable: attribute };
    const param = this.fn.params.get(name);
    if (param !== undefined) return { kind: "parameter", variable: param };
    throw new SymbolNotFound(name);
  }
}
