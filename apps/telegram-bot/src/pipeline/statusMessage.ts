/**
 * Status Message
 *
 * The single reply a conversion keeps editing while it runs. At most one
 * edit is in flight; texts requested meanwhile replace each other, so only
 * the latest one is sent once the edit settles. An edit to the text already
 * shown is skipped (Telegram rejects "message is not modified").
 */

import type { Logger } from '@relay/utils';
import type { ChatTransport } from '../lib/transport.js';
import { bestEffort } from '../lib/notify.js';

export class StatusMessage {
  private readonly transport: ChatTransport;
  private readonly messageId: number;
  private readonly logger: Logger;
  /** Latest requested text */
  private currentText: string;
  /** Text last confirmed by the chat */
  private shownText: string;
  private pending: string | undefined;
  private draining = false;
  private idle: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(transport: ChatTransport, messageId: number, text: string, logger: Logger) {
    this.transport = transport;
    this.messageId = messageId;
    this.currentText = text;
    this.shownText = text;
    this.logger = logger;
  }

  /**
   * Send the initial status reply. Throws if the reply itself fails.
   */
  static async open(transport: ChatTransport, text: string, logger: Logger): Promise<StatusMessage> {
    const messageId = await transport.reply(text);
    return new StatusMessage(transport, messageId, text, logger);
  }

  get id(): number {
    return this.messageId;
  }

  get text(): string {
    return this.currentText;
  }

  /**
   * Request an edit; returns immediately
   */
  update(text: string): void {
    if (this.closed || text === this.currentText) {
      return;
    }
    this.currentText = text;
    this.pending = text;
    if (!this.draining) {
      this.draining = true;
      this.idle = this.drain();
    }
  }

  /**
   * Wait until no edit is in flight or pending
   */
  async flush(): Promise<void> {
    await this.idle;
  }

  /**
   * Final edit, or delete the message when no text is given.
   * Later updates are ignored.
   */
  async finish(finalText?: string): Promise<void> {
    if (this.closed) {
      return this.flush();
    }
    if (finalText !== undefined) {
      this.update(finalText);
      this.closed = true;
      return this.flush();
    }

    this.closed = true;
    this.pending = undefined;
    await this.flush();
    await bestEffort(this.logger, 'delete status', () => this.transport.deleteMessage(this.messageId));
  }

  private async drain(): Promise<void> {
    try {
      let next = this.pending;
      while (next !== undefined) {
        this.pending = undefined;
        if (next !== this.shownText) {
          const text = next;
          const sent = await bestEffort(this.logger, 'edit status', () => this.transport.editMessage(this.messageId, text));
          if (sent) {
            this.shownText = text;
          }
        }
        next = this.pending;
      }
    } finally {
      this.draining = false;
    }
  }
}
