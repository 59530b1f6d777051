import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ContextError } from "unfurl-shared";

export interface UserContext {
  id: string;
  [key: string]: unknown;
}

/**
 * Request-scoped state propagated through async calls.
 *
 * @example
 * ```typescript
 * await Context.run(Context.create({ requestId: req.get('x-request-id') }), async () => {
 *   Logger.get().info('handled'); // request_id is injected
 * });
 * ```
 */
export interface KernelContext {
  requestId: string;
  traceId: string;
  user?: UserContext;
  metadata: Record<string, unknown>;
  /** Cancellation */
  signal?: AbortSignal;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<KernelContext> = {}): KernelContext {
    return {
      requestId: overrides.requestId ?? randomUUID(),
      traceId: overrides.traceId ?? randomUUID(),
      metadata: overrides.metadata ?? {},
      user: overrides.user,
      signal: overrides.signal,
    };
  }

  /**
   * Runs a function within the given context.
   */
  static run<T>(context: KernelContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * `metadata` is shared with the parent.
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return { ...parent, ...overrides };
  }

  /**
   * Creates a child context and runs a function within it.
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => T): T {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }
}
