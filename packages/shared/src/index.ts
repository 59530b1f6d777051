/**
 * # Unfurl Shared Types
 *
 * Platform-independent type definitions shared across the unfurl packages:
 * conversations and messages, content sections and reveal tokens, the model
 * catalog, HTTP API bodies and the error hierarchy.
 *
 * ```typescript
 * import { ContentType, type Message } from 'unfurl-shared';
 * ```
 *
 * @module unfurl-shared
 */

export * from "./messages";
export * from "./content";
export * from "./models";
export * from "./api";
export * from "./errors";
