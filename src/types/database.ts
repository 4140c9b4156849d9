// Database row types
// `signals` lives in Neon Postgres; `chat_messages` is written by the chat ingester and read over Supabase Realtime.

import type { OptionType, TradeAction, Underlying } from './index';

/**
 * Row of the `signals` table as returned by the Neon driver.
 * NUMERIC columns arrive as strings and TIMESTAMPTZ as Date.
 */
export interface SignalRow {
  id: string;
  created_at: Date | string;
  signal_time: Date | string;
  trading_symbol: string;
  underlying: Underlying;
  strike: number;
  option_type: OptionType;
  action: TradeAction;
  entry_trigger: string | number;
  stop_loss: string | number | null;
  target: string | number | null;
  is_positional: boolean;
  expiry_date: Date | string;
  raw_text: string;
}

/** Row of the `chat_messages` table */
export type ChatMessageRow = {
  id: string;
  created_at: string;
  channel: string | null;
  text: string;
  /** Time the message was posted in the chat, ISO 8601 */
  sent_at: string | null;
};

export interface Database {
  public: {
    Tables: {
      chat_messages: {
        Row: ChatMessageRow;
        Insert: {
          id?: string;
          created_at?: string;
          channel?: string | null;
          text: string;
          sent_at?: string | null;
        };
        Update: {
          id?: string;
          created_at?: string;
          channel?: string | null;
          text?: string;
          sent_at?: string | null;
        };
        Relationships: [];
      };
    };
    Views: Record<string, never>;
    Functions: Record<string, never>;
    Enums: Record<string, never>;
    CompositeTypes: Record<string, never>;
  };
}
