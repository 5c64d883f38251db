// A name lookup missed. Never leaves the translator: callers turn it into
// NotTranslatable.
export class SymbolNotFound extends Error {
  constructor(public readonly symbol : string) {
    super(`'${symbol}' is not declared`);
    this.name = "SymbolNotFound";
  }
}

// The construct has no faithful C++ rendering; the enclosing statement is
// passed through with the reason attached.
export class NotTranslatable extends Error {
  constructor(public readonly reason : string) {
    super(reason);
    this.name = "NotTranslatable";
  }
}

export function fail(reason : string) : never {
  throw new NotTranslatable(reason);
}
