/**
 * # Unfurl Kernel
 *
 * Ambient runtime shared by the server and client packages:
 *
 * - **Context** - Request-scoped state with automatic async propagation
 * - **Logger** - Structured pino logging with context injection
 *
 * @module unfurl-kernel
 */

export * from "./context";
export * from "./logger";
