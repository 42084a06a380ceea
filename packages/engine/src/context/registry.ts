/**
 * Contextual instance registry.
 *
 * Schema parameters using ContextualLookup ask for an instance of a declared
 * type; callers register those instances here before deriving.
 */

export type TypeToken<T> = {
  readonly name: string;
  /** Phantom member carrying the token's value type */
  readonly __type?: T;
};

export const createToken = <T>(name: string): TypeToken<T> => ({ name });

/**
 * Where a registered value can be imported from in generated code
 */
export type ValueSource = {
  readonly module: string;
  readonly exportName: string;
};

export type ValueRef<T> = {
  readonly token: TypeToken<T>;
  readonly value: T;
  readonly source?: ValueSource;
};

export type ContextResolver = {
  readonly lookup: <T>(token: TypeToken<T>) => ValueRef<T> | undefined;
};

/**
 * Registry keyed by token identity. A parent registry is consulted when a
 * token is not registered locally.
 */
export class ContextRegistry implements ContextResolver {
  private readonly refs = new Map<TypeToken<unknown>, ValueRef<unknown>>();

  constructor(private readonly parent?: ContextResolver) {}

  register<T>(token: TypeToken<T>, value: T, source?: ValueSource): this {
    if (this.refs.has(token)) {
      throw new Error(`Type '${token.name}' is already registered`);
    }
    const ref: ValueRef<T> = { token, value, source };
    this.refs.set(token, ref);
    return this;
  }

  has(token: TypeToken<unknown>): boolean {
    return this.lookup(token) !== undefined;
  }

  lookup<T>(token: TypeToken<T>): ValueRef<T> | undefined {
    const local = this.refs.get(token);
    if (local && isRefFor(local, token)) {
      return local;
    }
    return this.parent?.lookup(token);
  }
}

/**
 * Entries are stored under their own token, so a hit always carries the
 * token it was found under.
 */
const isRefFor = <T>(
  ref: ValueRef<unknown>,
  token: TypeToken<T>
): ref is ValueRef<T> => ref.token === token;

export const emptyResolver: ContextResolver = {
  lookup: () => undefined,
};
