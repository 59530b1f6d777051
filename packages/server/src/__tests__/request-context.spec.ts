/**
 * Tests for request context extraction and attachment
 */

import { ContextError } from "unfurl-shared";
import {
  attachContext,
  buildKernelContext,
  createIdGenerator,
  createPrefixedIdGenerator,
  defaultContextExtractor,
  getContext,
  requireContext,
  uuidV4Generator,
} from "../request-context";

describe("ID Generators", () => {
  it("should generate valid UUID v4 format", () => {
    expect(uuidV4Generator()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("should create ID with prefix", () => {
    expect(createPrefixedIdGenerator("msg")()).toMatch(/^msg_[0-9a-f-]+$/);
  });

  it("should wrap a custom function", () => {
    let n = 0;
    const generator = createIdGenerator(() => `seq-${++n}`);
    expect([generator(), generator()]).toEqual(["seq-1", "seq-2"]);
  });
});

describe("defaultContextExtractor", () => {
  it("should read request and user headers", () => {
    const ctx = defaultContextExtractor({ "x-request-id": "req-1", "x-user-id": "u-7" }, { id: "c-3" });

    expect(ctx).toEqual({ requestId: "req-1", userId: "u-7", chatId: "c-3" });
  });

  it("should generate a request id and default the user", () => {
    const ctx = defaultContextExtractor({ "x-request-id": ["  "] });

    expect(ctx.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(ctx.userId).toBe("anonymous");
    expect(ctx.chatId).toBeUndefined();
  });

  it("should take the first of repeated headers", () => {
    expect(defaultContextExtractor({ "x-request-id": ["a", "b"] }).requestId).toBe("a");
  });
});

describe("buildKernelContext", () => {
  it("should map the request onto a kernel context", () => {
    const controller = new AbortController();
    const ctx = buildKernelContext(
      { requestId: "req-1", userId: "u-7", chatId: "c-3", metadata: { source: "test" } },
      controller.signal,
    );

    expect(ctx.requestId).toBe("req-1");
    expect(ctx.user).toEqual({ id: "u-7" });
    expect(ctx.metadata).toEqual({ chatId: "c-3", source: "test" });
    expect(ctx.signal).toBe(controller.signal);
  });
});

describe("request attachment", () => {
  it("should round-trip context through a request object", () => {
    const request = {};
    attachContext(request, { requestId: "req-1", userId: "anonymous" });

    expect(getContext(request)?.requestId).toBe("req-1");
    expect(requireContext(request).userId).toBe("anonymous");
  });

  it("should throw when nothing is attached", () => {
    expect(getContext({})).toBeUndefined();
    expect(() => requireContext({})).toThrow(ContextError);
  });
});
