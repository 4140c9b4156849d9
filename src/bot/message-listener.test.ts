import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MessageListener, toRawMessage } from './message-listener';
import type { ChatMessageRow } from '../types/database';
import type { RawMessage } from '../types';

vi.mock('../lib/logger', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { logger: log, createLogger: () => log };
});

// Mock channel
const mockUnsubscribe = vi.fn().mockResolvedValue(undefined);
let capturedCallback: ((payload: { new: ChatMessageRow }) => void) | null = null;

const mockChannel = {
  on: vi.fn().mockImplementation((_event: string, _filter: unknown, callback: (payload: { new: ChatMessageRow }) => void) => {
    capturedCallback = callback;
    return mockChannel;
  }),
  subscribe: vi.fn().mockImplementation((callback: (status: string) => void) => {
    callback('SUBSCRIBED');
    return mockChannel;
  }),
  unsubscribe: mockUnsubscribe,
};

const mockSupabase = {
  channel: vi.fn().mockReturnValue(mockChannel),
} as unknown as Parameters<MessageListener['start']>[0];

function makeRow(overrides?: Partial<ChatMessageRow>): ChatMessageRow {
  return {
    id: 'msg-1',
    created_at: '2025-12-01T04:00:05Z',
    channel: 'signals',
    text: 'BUY NIFTY 24000 CE ABOVE 120',
    sent_at: '2025-12-01T04:00:00Z',
    ...overrides,
  };
}

describe('toRawMessage', () => {
  it('prefers the chat send time', () => {
    expect(toRawMessage(makeRow())).toEqual({
      text: 'BUY NIFTY 24000 CE ABOVE 120',
      timestamp: new Date('2025-12-01T04:00:00Z'),
    });
  });

  it('falls back to the row creation time', () => {
    expect(toRawMessage(makeRow({ sent_at: null }))?.timestamp).toEqual(new Date('2025-12-01T04:00:05Z'));
  });

  it('drops empty and undated rows', () => {
    expect(toRawMessage(makeRow({ text: '   ' }))).toBeNull();
    expect(toRawMessage(makeRow({ sent_at: 'not a date' }))).toBeNull();
  });
});

describe('MessageListener', () => {
  let listener: MessageListener;

  beforeEach(() => {
    vi.clearAllMocks();
    capturedCallback = null;
    listener = new MessageListener();
  });

  describe('subscription setup', () => {
    it('subscribes to chat_messages INSERT events', () => {
      listener.start(mockSupabase);

      expect(mockSupabase.channel).toHaveBeenCalledWith('bot-chat-messages');
      expect(mockChannel.on).toHaveBeenCalledWith(
        'postgres_changes',
        { event: 'INSERT', schema: 'public', table: 'chat_messages' },
        expect.any(Function),
      );
      expect(mockChannel.subscribe).toHaveBeenCalled();
    });

    it('does not subscribe twice', () => {
      listener.start(mockSupabase);
      listener.start(mockSupabase);

      expect(mockSupabase.channel).toHaveBeenCalledTimes(1);
    });
  });

  describe('message handling', () => {
    it('emits a RawMessage for each inserted row', () => {
      const received: RawMessage[] = [];
      listener.on('message', (message: RawMessage) => received.push(message));
      listener.start(mockSupabase);

      capturedCallback?.({ new: makeRow() });

      expect(received).toEqual([
        { text: 'BUY NIFTY 24000 CE ABOVE 120', timestamp: new Date('2025-12-01T04:00:00Z') },
      ]);
    });

    it('ignores rows without text', () => {
      const handler = vi.fn();
      listener.on('message', handler);
      listener.start(mockSupabase);

      capturedCallback?.({ new: makeRow({ text: '' }) });

      expect(handler).not.toHaveBeenCalled();
    });

    it('filters by chat channel when configured', () => {
      const handler = vi.fn();
      listener = new MessageListener('signals');
      listener.on('message', handler);
      listener.start(mockSupabase);

      capturedCallback?.({ new: makeRow({ channel: 'general' }) });
      capturedCallback?.({ new: makeRow({ id: 'msg-2' }) });

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('stop', () => {
    it('unsubscribes from the channel', async () => {
      listener.start(mockSupabase);
      await listener.stop();

      expect(mockUnsubscribe).toHaveBeenCalledTimes(1);
    });

    it('is a no-op before start', async () => {
      await listener.stop();

      expect(mockUnsubscribe).not.toHaveBeenCalled();
    });
  });
});
