/**
 * Tests for ChatApiClient
 */

import { AbortError, TransportError } from "unfurl-shared";
import { ChatApiClient, type ChatApiClientConfig, type FetchLike } from "../api-client";

const STAMP = "2024-05-01T09:30:00.000Z";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function ok(data: unknown): Response {
  return jsonResponse({ success: true, data });
}

/** A fetch that never settles until its signal aborts. */
function hangingFetch() {
  return vi.fn<FetchLike>(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted")));
      }),
  );
}

function setup(config: ChatApiClientConfig = {}) {
  const fetch = vi.fn<FetchLike>();
  const client = new ChatApiClient({ baseUrl: "http://api.test/", fetch, ...config });
  return { fetch, client };
}

describe("ChatApiClient", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("successful requests", () => {
    it("should list conversation summaries with parsed dates", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(
        ok([{ id: "c-1", title: "Greeting", model: "gpt-4", lastMessage: "Hi", createdAt: STAMP, updatedAt: STAMP }]),
      );

      const summaries = await client.listConversations();

      expect(summaries).toEqual([
        {
          id: "c-1",
          title: "Greeting",
          model: "gpt-4",
          lastMessage: "Hi",
          createdAt: new Date(STAMP),
          updatedAt: new Date(STAMP),
        },
      ]);
      const [url, init] = fetch.mock.calls[0];
      expect(url).toBe("http://api.test/api/chat");
      expect(init?.method).toBe("GET");
      expect(init?.headers).toEqual({ Accept: "application/json" });
      expect(init?.body).toBeUndefined();
    });

    it("should post messages as JSON and return domain messages", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(
        ok({
          chatId: "c-1",
          title: "Greeting",
          userMessage: { id: "m-1", role: "user", content: "Hello", timestamp: STAMP, hasAnimated: true },
          aiMessage: {
            id: "m-2",
            role: "assistant",
            content: "Hi!",
            images: [],
            timestamp: STAMP,
            hasAnimated: false,
            modelUsed: "gpt-4",
            tokensUsed: 12,
          },
        }),
      );

      const result = await client.sendMessage({ chatId: "c-1", message: { content: "Hello" } });

      expect(result.chatId).toBe("c-1");
      expect(result.userMessage).toEqual({
        id: "m-1",
        role: "user",
        content: "Hello",
        images: [],
        timestamp: new Date(STAMP),
        hasAnimated: true,
      });
      expect(result.aiMessage.modelUsed).toBe("gpt-4");
      const [, init] = fetch.mock.calls[0];
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({ Accept: "application/json", "Content-Type": "application/json" });
      expect(init?.body).toBe('{"chatId":"c-1","message":{"content":"Hello"}}');
    });

    it("should encode ids into paths", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(ok({ id: "a b" }));

      await client.deleteConversation("a b");

      expect(fetch.mock.calls[0][0]).toBe("http://api.test/api/chat/a%20b");
      expect(fetch.mock.calls[0][1]?.method).toBe("DELETE");
    });

    it("should rename through the rename route", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(
        ok({ id: "c-1", title: "Renamed", model: "gpt-4", lastMessage: "", createdAt: STAMP, updatedAt: STAMP }),
      );

      const summary = await client.renameConversation("c-1", "Renamed");

      expect(summary.title).toBe("Renamed");
      expect(fetch.mock.calls[0][0]).toBe("http://api.test/api/chat/c-1/rename");
      expect(fetch.mock.calls[0][1]?.body).toBe('{"title":"Renamed"}');
    });

    it("should validate models", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(ok({ modelId: "gpt-4", isAvailable: true, message: "Model is available" }));

      await expect(client.validateModel("gpt-4")).resolves.toEqual({
        modelId: "gpt-4",
        isAvailable: true,
        message: "Model is available",
      });
      expect(fetch.mock.calls[0][0]).toBe("http://api.test/api/models/validate");
    });

    it("should list the provider's models", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(ok([{ id: "gpt-4o", ownedBy: "system", created: 1715367049 }]));

      await expect(client.listProviderModels()).resolves.toEqual([
        { id: "gpt-4o", ownedBy: "system", created: 1715367049 },
      ]);
      expect(fetch.mock.calls[0][0]).toBe("http://api.test/api/models/openai");
    });

    it("should apply custom routes and headers", async () => {
      const { fetch, client } = setup({
        routes: { models: () => "/v2/models" },
        headers: { Authorization: "Bearer test-secret" },
      });
      fetch.mockResolvedValueOnce(ok([]));

      await client.listModels();

      const [url, init] = fetch.mock.calls[0];
      expect(url).toBe("http://api.test/v2/models");
      expect(init?.headers).toEqual({ Accept: "application/json", Authorization: "Bearer test-secret" });
    });
  });

  describe("failures", () => {
    it("should turn structured error bodies into transport errors", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(
        jsonResponse({ success: false, error: "conversation 'c-9' not found", code: "NOT_FOUND_CONVERSATION" }, 404),
      );

      const error = await client.getConversation("c-9").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        message: "conversation 'c-9' not found",
        statusCode: 404,
        serverCode: "NOT_FOUND_CONVERSATION",
        code: "TRANSPORT_RESPONSE",
      });
    });

    it("should keep plain-text error bodies as the message", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(new Response("Bad gateway", { status: 502 }));

      await expect(client.listModels()).rejects.toMatchObject({
        message: "Bad gateway",
        statusCode: 502,
      });
    });

    it("should fall back to the status when the body says nothing", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(new Response(null, { status: 500 }));

      await expect(client.listModels()).rejects.toMatchObject({ message: "HTTP 500", statusCode: 500 });
    });

    it("should reject bodies that do not match the expected shape", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(ok([{ title: "missing id" }]));

      await expect(client.listConversations()).rejects.toMatchObject({
        code: "TRANSPORT_PARSE",
        transportCode: "parse",
      });
    });

    it("should reject responses without the success envelope", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(jsonResponse([]));

      await expect(client.listModels()).rejects.toMatchObject({ code: "TRANSPORT_PARSE" });
    });

    it("should reject successful responses that are not JSON", async () => {
      const { fetch, client } = setup();
      fetch.mockResolvedValueOnce(new Response("<html></html>", { status: 200 }));

      await expect(client.listModels()).rejects.toMatchObject({
        code: "TRANSPORT_PARSE",
        message: "Response is not valid JSON",
      });
    });

    it("should report network failures as connection errors", async () => {
      const { fetch, client } = setup();
      fetch.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(client.listModels()).rejects.toMatchObject({
        code: "TRANSPORT_CONNECTION",
        message: "fetch failed",
      });
    });
  });

  describe("cancellation", () => {
    it("should not call fetch with an already aborted signal", async () => {
      const { fetch, client } = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(client.listModels(controller.signal)).rejects.toBeInstanceOf(AbortError);
      expect(fetch).not.toHaveBeenCalled();
    });

    it("should abort an in-flight request with the caller's signal", async () => {
      const fetch = hangingFetch();
      const client = new ChatApiClient({ fetch });
      const controller = new AbortController();

      const pending = client.listModels(controller.signal);
      controller.abort(new Error("user cancelled"));

      await expect(pending).rejects.toMatchObject({ code: "ABORT_SIGNAL", message: "user cancelled" });
    });

    it("should time out slow requests", async () => {
      vi.useFakeTimers();
      const client = new ChatApiClient({ fetch: hangingFetch(), requestTimeout: 1000 });

      const assertion = expect(client.listModels()).rejects.toMatchObject({
        code: "ABORT_TIMEOUT",
        message: "Operation timed out after 1000ms",
      });
      await vi.advanceTimersByTimeAsync(1000);

      await assertion;
    });

    it("should not time out when the timeout is disabled", async () => {
      vi.useFakeTimers();
      const fetch = hangingFetch();
      const client = new ChatApiClient({ fetch, requestTimeout: 0 });
      const controller = new AbortController();

      const pending = client.listModels(controller.signal);
      await vi.advanceTimersByTimeAsync(120_000);
      expect(fetch.mock.calls[0][1]?.signal?.aborted).toBe(false);

      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(AbortError);
    });
  });
});
