import { Logger, composeContextFields, defaultContextFields, type DestinationStream } from './logger';
import { Context, type KernelContext } from './context';

/** In-memory pino destination collecting parsed log lines. */
function createCapture(): DestinationStream & { lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

describe('Logger', () => {
  beforeEach(() => {
    Logger.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('basic logging', () => {
    it('should support all log levels', () => {
      const capture = createCapture();
      Logger.configure({ level: 'trace', destination: capture });
      const log = Logger.get();

      log.trace('trace message');
      log.debug('debug message');
      log.info('info message');
      log.warn('warn message');
      log.error('error message');
      log.fatal('fatal message');

      expect(capture.lines.map((line) => line.msg)).toEqual([
        'trace message',
        'debug message',
        'info message',
        'warn message',
        'error message',
        'fatal message',
      ]);
    });

    it('should support object arguments', () => {
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture });

      Logger.get().info({ chatId: 'c-1' }, 'message with object');

      expect(capture.lines[0]).toMatchObject({ chatId: 'c-1', msg: 'message with object', level: 30 });
    });
  });

  describe('configuration', () => {
    it('should configure log level', () => {
      Logger.configure({ level: 'debug', destination: createCapture() });
      expect(Logger.level).toBe('debug');
    });

    it('should allow changing level at runtime', () => {
      Logger.configure({ level: 'info', destination: createCapture() });
      expect(Logger.level).toBe('info');

      Logger.setLevel('debug');
      expect(Logger.level).toBe('debug');
    });

    it('should check if level is enabled', () => {
      Logger.configure({ level: 'info', destination: createCapture() });

      expect(Logger.isLevelEnabled('info')).toBe(true);
      expect(Logger.isLevelEnabled('warn')).toBe(true);
      expect(Logger.isLevelEnabled('debug')).toBe(false);
      expect(Logger.isLevelEnabled('trace')).toBe(false);
    });

    it('should fall back to LOG_LEVEL from the environment', () => {
      vi.stubEnv('LOG_LEVEL', 'warn');
      Logger.configure({ destination: createCapture() });
      expect(Logger.level).toBe('warn');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'loud');
      Logger.configure({ destination: createCapture() });
      expect(Logger.level).toBe('info');
    });
  });

  describe('child loggers', () => {
    it('should bind the component name from a string', () => {
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture });

      Logger.for('RevealSession').info('started');

      expect(capture.lines[0].component).toBe('RevealSession');
    });

    it('should bind the component name from an object', () => {
      class ChatSession {}
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture });

      Logger.for(new ChatSession()).info('created');

      expect(capture.lines[0].component).toBe('ChatSession');
    });

    it('should allow chaining child loggers', () => {
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture });

      Logger.for('Component').child({ operation: 'test' }).info('chained');

      expect(capture.lines[0]).toMatchObject({ component: 'Component', operation: 'test' });
    });
  });

  describe('context integration', () => {
    it('should log without a context', () => {
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture });

      Logger.get().info('No context');

      expect(capture.lines[0].request_id).toBeUndefined();
    });

    it('should inject context fields when available', () => {
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture });
      const ctx = Context.create({ requestId: 'req-123', traceId: 'trace-456', user: { id: 'user-789' } });

      Context.run(ctx, () => Logger.get().info('With context'));

      expect(capture.lines[0]).toMatchObject({
        request_id: 'req-123',
        trace_id: 'trace-456',
        user_id: 'user-789',
      });
    });

    it('should skip context when includeContext is false', () => {
      const capture = createCapture();
      Logger.configure({ level: 'info', destination: capture, includeContext: false });

      Context.run(Context.create({ requestId: 'req-1' }), () => Logger.get().info('quiet'));

      expect(capture.lines[0].request_id).toBeUndefined();
    });
  });

  describe('standalone logger', () => {
    it('should create standalone logger with custom config', () => {
      const log = Logger.create({ level: 'warn', destination: createCapture() });
      expect(log.isLevelEnabled('warn')).toBe(true);
      expect(log.isLevelEnabled('info')).toBe(false);
      expect(log.level).toBe('warn');
    });

    it('should not affect global logger', () => {
      Logger.configure({ level: 'info', destination: createCapture() });
      const standalone = Logger.create({ level: 'error', destination: createCapture() });

      expect(Logger.level).toBe('info');
      expect(standalone.isLevelEnabled('warn')).toBe(false);
    });
  });

  describe('composeContextFields', () => {
    const ctx: KernelContext = {
      requestId: 'req-123',
      traceId: 'trace-456',
      user: { id: 'user-789' },
      metadata: { chatId: 'chat-1' },
    };

    it('should compose multiple extractors', () => {
      const composed = composeContextFields(defaultContextFields, (c) => ({
        chat_id: c.metadata.chatId,
      }));

      expect(composed(ctx)).toEqual({
        request_id: 'req-123',
        trace_id: 'trace-456',
        user_id: 'user-789',
        chat_id: 'chat-1',
      });
    });

    it('should allow later extractors to override earlier ones', () => {
      const composed = composeContextFields(
        () => ({ key: 'original' }),
        () => ({ key: 'overridden' }),
      );

      expect(composed(ctx).key).toBe('overridden');
    });

    it('should add custom fields on top of the defaults when configured', () => {
      const capture = createCapture();
      Logger.configure({
        level: 'info',
        destination: capture,
        contextFields: (c) => ({ chat_id: c.metadata.chatId }),
      });

      Context.run(ctx, () => Logger.get().info('custom'));

      expect(capture.lines[0]).toMatchObject({ request_id: 'req-123', chat_id: 'chat-1' });
    });
  });
});
