import type { RevealStatus } from "unfurl-shared";
import type { KernelLogger } from "unfurl-kernel";
import { RevealSession } from "./session";

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

describe("RevealSession", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should reveal the first token immediately", () => {
    const onUpdate = vi.fn();
    const session = RevealSession.fromText("Hello, world!", { onUpdate });

    expect(session.start()).toBe(true);

    expect(session.status).toBe("running");
    expect(session.cursor).toBe(1);
    expect(onUpdate).toHaveBeenLastCalledWith("Hello●", expect.objectContaining({ revealed: "Hello" }));
  });

  it("should wait the delay of each upcoming token", () => {
    const session = RevealSession.fromText("Hello, world!");
    session.start();

    vi.advanceTimersByTime(39);
    expect(session.cursor).toBe(1);
    vi.advanceTimersByTime(1);
    expect(session.cursor).toBe(2);
    vi.advanceTimersByTime(20);
    expect(session.cursor).toBe(3);
    expect(session.displayText).toBe("Hello, world●");
    vi.advanceTimersByTime(80);
    expect(session.status).toBe("completed");
    expect(session.displayText).toBe("Hello, world!");
  });

  it("should keep at most one timer pending", () => {
    const session = RevealSession.fromText("one two three four");
    session.start();

    expect(vi.getTimerCount()).toBe(1);
    vi.advanceTimersByTime(20);
    expect(vi.getTimerCount()).toBe(1);
  });

  it("should advance the cursor monotonically and complete once", () => {
    const cursors: number[] = [];
    const onComplete = vi.fn();
    const session = RevealSession.fromText("A quick test, with several words. Done!", {
      onUpdate: (_text, snapshot) => cursors.push(snapshot.cursor),
      onComplete,
    });

    session.start();
    vi.runAllTimers();

    expect(cursors).toEqual([...cursors].sort((a, b) => a - b));
    expect(cursors[cursors.length - 1]).toBe(session.total);
    expect(cursors.filter((cursor) => cursor === session.total)).toHaveLength(1);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  describe("pause and resume", () => {
    it("should hold the cursor while paused", () => {
      const session = RevealSession.fromText("Hello, world!");
      session.start();
      vi.advanceTimersByTime(40);

      expect(session.pause()).toBe(true);
      expect(session.isScheduled).toBe(false);
      vi.advanceTimersByTime(1000);
      expect(session.cursor).toBe(2);
      expect(session.displayText).toBe("Hello,●");
    });

    it("should restart the full delay on resume", () => {
      const session = RevealSession.fromText("Hello, world!");
      session.start();
      vi.advanceTimersByTime(40);
      session.pause();

      expect(session.resume()).toBe(true);
      vi.advanceTimersByTime(19);
      expect(session.cursor).toBe(2);
      vi.advanceTimersByTime(1);
      expect(session.cursor).toBe(3);
    });

    it("should reject transitions from the wrong state", () => {
      const session = RevealSession.fromText("Hello, world!");

      expect(session.pause()).toBe(false);
      expect(session.resume()).toBe(false);
      session.start();
      expect(session.start()).toBe(false);
      expect(session.resume()).toBe(false);
    });
  });

  describe("cancel", () => {
    it("should leave the prefix and never complete", () => {
      const onComplete = vi.fn();
      const session = RevealSession.fromText("Hello, world!", { onComplete });
      session.start();

      expect(session.cancel()).toBe(true);
      vi.runAllTimers();

      expect(session.status).toBe("canceled");
      expect(session.displayText).toBe("Hello");
      expect(onComplete).not.toHaveBeenCalled();
      expect(vi.getTimerCount()).toBe(0);
      expect(session.cancel()).toBe(false);
    });

    it("should cancel on dispose and drop callbacks", () => {
      const onUpdate = vi.fn();
      const session = RevealSession.fromText("Hello, world!", { onUpdate });
      session.start();
      onUpdate.mockClear();

      session.dispose();
      session.dispose();

      expect(session.status).toBe("canceled");
      expect(onUpdate).toHaveBeenCalledTimes(1);
    });
  });

  it("should skip to the end", () => {
    const onComplete = vi.fn();
    const session = RevealSession.fromText("Hello, world!", { onComplete });
    session.start();

    expect(session.skipToEnd()).toBe(true);

    expect(session.status).toBe("completed");
    expect(session.displayText).toBe("Hello, world!");
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should complete empty text on start", () => {
    const onComplete = vi.fn();
    const session = RevealSession.fromText("", { onComplete });

    session.start();

    expect(session.status).toBe("completed");
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("should scale delays by speed", () => {
    const session = RevealSession.fromText("Hello, world!", { speed: 0.5 });
    session.start();

    vi.advanceTimersByTime(20);
    expect(session.cursor).toBe(2);
  });

  it("should report status changes", () => {
    const changes: Array<[RevealStatus, RevealStatus]> = [];
    const session = RevealSession.fromText("Hi there", {
      onStatusChange: (status, previous) => changes.push([status, previous]),
    });

    session.start();
    session.pause();
    session.resume();
    vi.runAllTimers();

    expect(changes).toEqual([
      ["running", "idle"],
      ["paused", "running"],
      ["running", "paused"],
      ["completed", "running"],
    ]);
  });

  it("should cancel when a callback throws", () => {
    const { logger, warn } = createLoggerStub();
    const onComplete = vi.fn();
    const onError = vi.fn();
    const onStatusChange = vi.fn();
    const onUpdate = vi.fn<(text: string) => void>().mockImplementationOnce(() => {
      throw new Error("view gone");
    });
    const session = RevealSession.fromText("Hello, world!", {
      logger,
      onComplete,
      onError,
      onStatusChange,
      onUpdate,
    });

    session.start();
    vi.runAllTimers();

    expect(session.status).toBe("canceled");
    expect(onStatusChange).toHaveBeenLastCalledWith("canceled", "running");
    expect(onUpdate.mock.calls.map(([text]) => text)).toEqual(["Hello●", "Hello"]);
    expect(onError).toHaveBeenCalledWith(new Error("view gone"));
    expect(onComplete).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should use an injected clock", () => {
    const pending: Array<{ callback: () => void; delayMs: number }> = [];
    const session = RevealSession.fromText("Hello, world!", {
      clock: {
        schedule(callback, delayMs) {
          pending.push({ callback, delayMs });
          return () => undefined;
        },
      },
    });

    session.start();

    expect(pending.map((entry) => entry.delayMs)).toEqual([40]);
    pending[0].callback();
    expect(session.cursor).toBe(2);
    expect(pending.map((entry) => entry.delayMs)).toEqual([40, 20]);
  });
});
