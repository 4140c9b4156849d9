// Message listener — subscribes to Supabase Realtime for new chat messages

import { EventEmitter } from 'events';
import type { RealtimeChannel, RealtimePostgresInsertPayload, SupabaseClient } from '@supabase/supabase-js';
import { errorMessage } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { RawMessage } from '../types';
import type { ChatMessageRow, Database } from '../types/database';

const log = createLogger('MessageListener');

/**
 * Convert a chat_messages row into a RawMessage.
 * Uses sent_at when present, else the row's created_at; null for empty or undated rows.
 */
export function toRawMessage(row: ChatMessageRow): RawMessage | null {
  if (typeof row.text !== 'string' || row.text.trim() === '') return null;
  const timestamp = new Date(row.sent_at ?? row.created_at);
  if (Number.isNaN(timestamp.getTime())) return null;
  return { text: row.text, timestamp };
}

/**
 * Listens for new chat messages via Supabase Realtime INSERT events.
 *
 * Emits 'message' with a RawMessage for every non-empty row. When `channelFilter`
 * is set, rows from other chat channels are ignored.
 */
export class MessageListener extends EventEmitter {
  private channel: RealtimeChannel | null = null;
  private readonly channelFilter: string | null;

  constructor(channelFilter: string | null = null) {
    super();
    this.channelFilter = channelFilter;
  }

  /**
   * Start listening for chat messages.
   */
  start(supabaseClient: SupabaseClient<Database>): void {
    if (this.channel) return;

    this.channel = supabaseClient
      .channel('bot-chat-messages')
      .on<ChatMessageRow>(
        'postgres_changes',
        {
          event: 'INSERT',
          schema: 'public',
          table: 'chat_messages',
        },
        (payload: RealtimePostgresInsertPayload<ChatMessageRow>) => {
          try {
            const row = payload.new;
            if (this.channelFilter && row.channel !== this.channelFilter) return;

            const message = toRawMessage(row);
            if (!message) return;

            log.debug('Chat message received', { id: row.id, channel: row.channel });
            this.emit('message', message);
          } catch (err) {
            log.error('Error processing chat message', { error: errorMessage(err) });
          }
        },
      )
      .subscribe((status) => {
        const s = String(status);
        if (s === 'SUBSCRIBED') {
          log.info('Subscribed to chat messages');
        } else if (s === 'CHANNEL_ERROR') {
          log.error('Chat message channel error');
        }
      });
  }

  /**
   * Stop listening and unsubscribe from Realtime.
   */
  async stop(): Promise<void> {
    if (this.channel) {
      await this.channel.unsubscribe();
      this.channel = null;
      log.info('Chat message listener unsubscribed');
    }
  }
}
