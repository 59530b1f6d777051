import { NotFoundError, ProviderError, ValidationError } from "unfurl-shared";
import type { KernelLogger } from "unfurl-kernel";
import { ChatService, FALLBACK_TITLE, fallbackTitle } from "../chat-service";
import { createInMemoryRepositories, type InMemoryStore } from "../persistence/in-memory";
import { FakeCompletionProvider } from "../testing";

function createLoggerStub() {
  const warn = vi.fn();
  const logger: KernelLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    level: "info",
    isLevelEnabled: () => true,
  };
  return { logger, warn };
}

const NOW = new Date("2024-03-01T12:00:00.000Z");

describe("fallbackTitle", () => {
  it("should keep short messages whole", () => {
    expect(fallbackTitle("  Plan a trip  ")).toBe("Plan a trip");
  });

  it("should cut long messages at 50 characters", () => {
    expect(fallbackTitle("a".repeat(60))).toBe(`${"a".repeat(50)}...`);
  });

  it("should use the default title for blank messages", () => {
    expect(fallbackTitle("   ")).toBe(FALLBACK_TITLE);
  });
});

describe("ChatService", () => {
  let provider: FakeCompletionProvider;
  let store: InMemoryStore;
  let service: ChatService;
  let warn: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    let n = 0;
    provider = new FakeCompletionProvider();
    const repos = createInMemoryRepositories();
    store = repos.store;
    const stub = createLoggerStub();
    warn = stub.warn;
    service = new ChatService({
      repository: repos.conversationRepo,
      provider,
      generateId: () => `id-${++n}`,
      now: () => NOW,
      logger: stub.logger,
    });
  });

  describe("sendMessage", () => {
    it("should start a conversation with a generated title", async () => {
      const result = await service.sendMessage({ content: "Hello there" });

      expect(result.chatId).toBe("id-3");
      expect(result.title).toBe("Fake title");
      expect(result.userMessage).toMatchObject({
        id: "id-1",
        role: "user",
        content: "Hello there",
        hasAnimated: true,
        timestamp: NOW,
      });
      expect(result.aiMessage).toMatchObject({
        id: "id-2",
        role: "assistant",
        content: "Fake reply",
        hasAnimated: false,
        modelUsed: "gpt-3.5-turbo",
        tokensUsed: 42,
      });
      expect(provider.titleRequests).toEqual(["Hello there"]);

      const stored = store.conversations.get("id-3");
      expect(stored?.messages.map((m) => m.id)).toEqual(["id-1", "id-2"]);
      expect(stored?.model).toBe("gpt-3.5-turbo");
    });

    it("should send the history with the new message", async () => {
      const first = await service.sendMessage({ content: "One" });
      await service.sendMessage({ chatId: first.chatId, content: "Two", model: "gpt-4" });

      const request = provider.requests[1];
      expect(request.model).toBe("gpt-4");
      expect(request.messages.map((m) => m.content)).toEqual(["One", "Fake reply", "Two"]);

      const stored = store.conversations.get(first.chatId);
      expect(stored?.messages).toHaveLength(4);
      expect(stored?.model).toBe("gpt-4");
      expect(provider.titleRequests).toEqual(["One"]);
    });

    it("should switch to the vision model when images are attached", async () => {
      const result = await service.sendMessage({
        content: "What is this?",
        model: "gpt-4",
        images: [{ url: "https://example.com/cat.png" }],
      });

      expect(provider.requests[0].model).toBe("gpt-4o");
      expect(result.aiMessage.modelUsed).toBe("gpt-4o");
      expect(result.userMessage.images).toEqual([{ id: "id-2", url: "https://example.com/cat.png" }]);
      expect(store.conversations.get(result.chatId)?.model).toBe("gpt-4");
    });

    it("should store nothing when the provider fails", async () => {
      provider.configure({ failWith: ProviderError.quota("fake") });

      await expect(service.sendMessage({ content: "Hello" })).rejects.toThrow(ProviderError);
      expect(store.conversations.size).toBe(0);
    });

    it("should leave an existing conversation untouched when the provider fails", async () => {
      const first = await service.sendMessage({ content: "One" });
      provider.configure({ failWith: new ProviderError("fake", "boom") });

      await expect(service.sendMessage({ chatId: first.chatId, content: "Two" })).rejects.toThrow("boom");
      expect(store.conversations.get(first.chatId)?.messages).toHaveLength(2);
    });

    it("should reject unknown conversations before calling the provider", async () => {
      await expect(service.sendMessage({ chatId: "missing", content: "Hi" })).rejects.toThrow(NotFoundError);
      expect(provider.requests).toHaveLength(0);
    });

    it("should fall back to the message prefix when title generation fails", async () => {
      provider.configure({ titleError: new Error("title down") });

      const result = await service.sendMessage({ content: "b".repeat(70) });

      expect(result.title).toBe(`${"b".repeat(50)}...`);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("should use the default title when the generated one is blank", async () => {
      provider.configure({ title: "   " });

      const result = await service.sendMessage({ content: "Hello" });

      expect(result.title).toBe("New Chat");
    });
  });

  describe("queries", () => {
    it("should list active conversations", async () => {
      const kept = await service.sendMessage({ content: "Keep" });
      const dropped = await service.sendMessage({ content: "Drop" });
      await service.delete(dropped.chatId);

      const summaries = await service.listConversations();

      expect(summaries.map((s) => s.id)).toEqual([kept.chatId]);
      expect(summaries[0].lastMessage).toBe("Fake reply");
    });

    it("should hide deleted conversations", async () => {
      const { chatId } = await service.sendMessage({ content: "Bye" });
      await service.delete(chatId);

      await expect(service.getConversation(chatId)).rejects.toThrow(NotFoundError);
    });

    it("should fail to delete unknown conversations", async () => {
      await expect(service.delete("missing")).rejects.toThrow(NotFoundError);
    });
  });

  describe("rename", () => {
    it("should store the trimmed title", async () => {
      const { chatId } = await service.sendMessage({ content: "Hello" });

      const renamed = await service.rename(chatId, "  Travel plans ");

      expect(renamed.title).toBe("Travel plans");
    });

    it("should reject blank titles", async () => {
      const { chatId } = await service.sendMessage({ content: "Hello" });

      await expect(service.rename(chatId, "  ")).rejects.toThrow(ValidationError);
    });

    it("should reject unknown conversations", async () => {
      await expect(service.rename("missing", "Title")).rejects.toThrow(NotFoundError);
    });
  });
});
