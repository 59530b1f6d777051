/**
 * Request Context Types and Utilities
 *
 * Framework-agnostic types and defaults for per-request context.
 * Framework adapters map their request shape onto {@link RequestContext},
 * attach it to the request object and run the handler inside the kernel
 * context built by {@link buildKernelContext}.
 */

import { randomUUID } from "node:crypto";
import { ContextError } from "unfurl-shared";
import { Context, type KernelContext } from "unfurl-kernel";

// =============================================================================
// Core Types
// =============================================================================

/**
 * Extracted context from an incoming request.
 */
export interface RequestContext {
  /** Correlates log lines for one request */
  requestId: string;
  /** User ID from auth, `anonymous` without one */
  userId: string;
  /** Conversation addressed by the request, when there is one */
  chatId?: string;
  metadata?: Record<string, unknown>;
}

export type RequestHeaders = Record<string, string | string[] | undefined>;

// =============================================================================
// ID Generators
// =============================================================================

export type IdGenerator = () => string;

/**
 * Default UUID v4 generator
 */
export const uuidV4Generator: IdGenerator = () => randomUUID();

/**
 * Create a prefixed ID generator
 * @example createPrefixedIdGenerator('msg') // -> 'msg_abc123...'
 */
export function createPrefixedIdGenerator(prefix: string): IdGenerator {
  return () => `${prefix}_${randomUUID()}`;
}

/**
 * Create an ID generator that uses a provided function
 * Useful for DB sequences, UUIDv7, etc.
 */
export function createIdGenerator(fn: () => string): IdGenerator {
  return fn;
}

// =============================================================================
// Context Extractors
// =============================================================================

export type ContextExtractor = (
  headers: RequestHeaders,
  params?: Record<string, string | undefined>,
) => RequestContext;

function firstHeader(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== "" ? first.trim() : undefined;
}

/**
 * Default context extractor: `x-request-id` and `x-user-id` headers, the
 * `id` route parameter as chat id.
 */
export const defaultContextExtractor: ContextExtractor = (headers, params) => ({
  requestId: firstHeader(headers, "x-request-id") ?? uuidV4Generator(),
  userId: firstHeader(headers, "x-user-id") ?? "anonymous",
  chatId: params?.id,
});

/**
 * Build the kernel context a request's handlers run inside.
 */
export function buildKernelContext(ctx: RequestContext, signal?: AbortSignal): KernelContext {
  return Context.create({
    requestId: ctx.requestId,
    user: { id: ctx.userId },
    metadata: {
      ...(ctx.chatId ? { chatId: ctx.chatId } : {}),
      ...ctx.metadata,
    },
    signal,
  });
}

// =============================================================================
// Request Attachment
// =============================================================================

const attached = new WeakMap<object, RequestContext>();

/**
 * Attach context to a framework request object.
 */
export function attachContext(request: object, ctx: RequestContext): void {
  attached.set(request, ctx);
}

export function getContext(request: object): RequestContext | undefined {
  return attached.get(request);
}

/**
 * @throws ContextError when nothing was attached
 */
export function requireContext(request: object): RequestContext {
  const ctx = attached.get(request);
  if (!ctx) {
    throw new ContextError("Request context not attached. Is the context middleware installed?");
  }
  return ctx;
}
