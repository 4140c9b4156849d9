// Message batcher — groups chat messages that arrive close together
// A batch closes after `delayMs` of silence and is emitted as a 'batch' event

import { EventEmitter } from 'events';
import type { RawMessage } from '../types';

export class MessageBatcher extends EventEmitter {
  private readonly delayMs: number;
  private pending: RawMessage[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(delayMs: number) {
    super();
    this.delayMs = delayMs;
  }

  /** Queue a message and restart the silence timer */
  push(message: RawMessage): void {
    this.pending.push(message);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.delayMs);
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Emit the pending messages now, in arrival order. Returns the batch size. */
  flush(): number {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.length === 0) return 0;

    const batch = this.pending;
    this.pending = [];
    this.emit('batch', batch);
    return batch.length;
  }

  /** Cancel the timer and emit whatever is pending */
  stop(): number {
    return this.flush();
  }
}
