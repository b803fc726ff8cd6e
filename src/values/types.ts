/**
 * Type descriptors attached to ports, literals and values. Concrete types are
 * identified by name; generic parameters stay symbolic until the compiler binds
 * them against the concrete types flowing into a node.
 */

/** Concrete type identified by its registered name (e.g. `f64`, `raster`). */
export interface ConcreteType {
  readonly kind: "concrete";
  readonly name: string;
}

/** Unbound generic parameter (e.g. `T`). */
export interface GenericType {
  readonly kind: "generic";
  readonly param: string;
}

/** Homogeneous list whose item type may itself be generic. */
export interface ListType {
  readonly kind: "list";
  readonly item: TypeDescriptor;
}

export type TypeDescriptor = ConcreteType | GenericType | ListType;

/** Generic parameter bindings collected while unifying a signature. */
export type TypeBindings = ReadonlyMap<string, TypeDescriptor>;

export function concrete(name: string): ConcreteType {
  return { kind: "concrete", name };
}

export function generic(param: string): GenericType {
  return { kind: "generic", param };
}

export function listOf(item: TypeDescriptor): ListType {
  return { kind: "list", item };
}

/** Renders a descriptor the way diagnostics and instance identifiers spell it. */
export function formatType(type: TypeDescriptor): string {
  switch (type.kind) {
    case "concrete":
      return type.name;
    case "generic":
      return `'${type.param}`;
    case "list":
      return `vec<${formatType(type.item)}>`;
  }
}

export function typesEqual(a: TypeDescriptor, b: TypeDescriptor): boolean {
  if (a.kind === "concrete" && b.kind === "concrete") {
    return a.name === b.name;
  }
  if (a.kind === "generic" && b.kind === "generic") {
    return a.param === b.param;
  }
  if (a.kind === "list" && b.kind === "list") {
    return typesEqual(a.item, b.item);
  }
  return false;
}

/** True when the descriptor contains no generic parameter at any depth. */
export function isConcreteType(type: TypeDescriptor): boolean {
  switch (type.kind) {
    case "concrete":
      return true;
    case "generic":
      return false;
    case "list":
      return isConcreteType(type.item);
  }
}

/**
 * Number of generic slots in the descriptor. Used as the specificity score
 * when several overloads accept the same inputs: fewer slots means more
 * specific.
 */
export function genericity(type: TypeDescriptor): number {
  switch (type.kind) {
    case "concrete":
      return 0;
    case "generic":
      return 1;
    case "list":
      return genericity(type.item);
  }
}

/** Replaces bound generic parameters, leaving unbound ones untouched. */
export function substitute(type: TypeDescriptor, bindings: TypeBindings): TypeDescriptor {
  switch (type.kind) {
    case "concrete":
      return type;
    case "generic":
      return bindings.get(type.param) ?? type;
    case "list":
      return listOf(substitute(type.item, bindings));
  }
}

/**
 * Unifies a (possibly generic) pattern with a concrete type, extending the
 * provided bindings in place. Returns false when the shapes disagree or when a
 * parameter is already bound to a different type.
 */
export function unify(
  pattern: TypeDescriptor,
  actual: TypeDescriptor,
  bindings: Map<string, TypeDescriptor>,
): boolean {
  switch (pattern.kind) {
    case "concrete":
      return actual.kind === "concrete" && actual.name === pattern.name;
    case "generic": {
      const bound = bindings.get(pattern.param);
      if (bound) {
        return typesEqual(bound, actual);
      }
      bindings.set(pattern.param, actual);
      return true;
    }
    case "list":
      return actual.kind === "list" && unify(pattern.item, actual.item, bindings);
  }
}

/**
 * Best-effort compatibility check used before compilation: two declared port
 * types are compatible when a single set of bindings makes them equal. Generic
 * parameters on either side are treated as wildcards scoped to their own node.
 */
export function typesCompatible(source: TypeDescriptor, target: TypeDescriptor): boolean {
  if (source.kind === "generic" || target.kind === "generic") {
    return true;
  }
  if (source.kind === "list" && target.kind === "list") {
    return typesCompatible(source.item, target.item);
  }
  return typesEqual(source, target);
}

/** Formats bindings deterministically (sorted by parameter name). */
export function formatBindings(bindings: TypeBindings): string {
  return Array.from(bindings.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([param, type]) => `${param}=${formatType(type)}`)
    .join(",");
}

/**
 * Parses the spelling produced by {@link formatType}: `'T` for a generic
 * parameter, `vec<...>` for a list, anything else as a concrete name.
 * Returns `undefined` for empty or unbalanced input.
 */
export function parseType(text: string): TypeDescriptor | undefined {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  if (trimmed.startsWith("'")) {
    const param = trimmed.slice(1);
    return /^[A-Za-z_][A-Za-z0-9_]*$/.test(param) ? generic(param) : undefined;
  }
  if (trimmed.startsWith("vec<")) {
    if (!trimmed.endsWith(">")) {
      return undefined;
    }
    const item = parseType(trimmed.slice(4, -1));
    return item ? listOf(item) : undefined;
  }
  return /[<>'\s]/.test(trimmed) ? undefined : concrete(trimmed);
}
