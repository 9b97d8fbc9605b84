import { Logger } from '@nestjs/common';

/**
 * Single-owner inbox. Messages are handled one at a time, in the order they
 * were told; a `tell` issued while a message is being handled only enqueues.
 * All state of a subclass is read and written from `receive` alone.
 */
export abstract class MessageLoop<M> {
  protected abstract readonly logger: Logger;

  private readonly inbox: M[] = [];
  private draining = false;

  tell(message: M): void {
    this.inbox.push(message);
    if (!this.draining) {
      this.drain();
    }
  }

  protected abstract receive(message: M): void;

  private drain(): void {
    this.draining = true;
    try {
      let message = this.inbox.shift();
      while (message !== undefined) {
        try {
          this.receive(message);
        } catch (error) {
          this.logger.error(
            `Failed to handle message: ${error instanceof Error ? error.message : error}`,
            error instanceof Error ? error.stack : undefined,
          );
        }
        message = this.inbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
