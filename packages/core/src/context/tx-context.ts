/**
 * TxContext
 *
 * Immutable, call-chain scoped context. Deriving a context with `withValue`
 * never changes the receiver, so a context handed to a callee can be shared
 * freely between sibling calls.
 *
 * Values are associated by reference: the context chain only records which
 * node a binding belongs to, the value itself is never copied.
 *
 * @example
 * ```typescript
 * const requestKey = new ContextKey<string>('request-id');
 * const ctx = TxContext.background().withValue(requestKey, 'req-1');
 *
 * ctx.value(requestKey); // 'req-1'
 * TxContext.background().value(requestKey); // undefined
 * ```
 */
export class TxContext {
  private static readonly root = new TxContext();

  static background(): TxContext {
    return TxContext.root;
  }

  private constructor(readonly parent?: TxContext) {}

  /**
   * Derive a child context binding `key` to `value`. Binding `null` hides any
   * value an ancestor holds for the same key.
   */
  withValue<T>(key: ContextKey<T>, value: T | null): TxContext {
    const child = new TxContext(this);
    key.attach(child, value);
    return child;
  }

  value<T>(key: ContextKey<T>): T | undefined {
    for (let node: TxContext | undefined = this; node; node = node.parent) {
      if (key.isAttached(node)) {
        return key.read(node) ?? undefined;
      }
    }
    return undefined;
  }
}

/**
 * Typed context key. Two keys never see each other's bindings, even when
 * created with the same description.
 */
export class ContextKey<T> {
  private readonly bindings = new WeakMap<TxContext, T | null>();

  constructor(readonly description: string) {}

  /** @internal */
  attach(ctx: TxContext, value: T | null): void {
    this.bindings.set(ctx, value);
  }

  /** @internal */
  isAttached(ctx: TxContext): boolean {
    return this.bindings.has(ctx);
  }

  /** @internal */
  read(ctx: TxContext): T | null | undefined {
    return this.bindings.get(ctx);
  }

  toString(): string {
    return `ContextKey(${this.description})`;
  }
}
