import { ChannelClosedError } from './Errors';

/**
 * Single-use reply slot, created by the requester and handed to the
 * responder inside the request.
 */
export class ReplyChannel<T> {
  private readonly reply: Promise<T>;
  private resolveReply: ((value: T) => void) | null = null;
  private sent: boolean = false;

  constructor() {
    this.reply = new Promise<T>((resolve) => {
      this.resolveReply = resolve;
    });
  }

  public send(value: T): void {
    if (this.sent || this.resolveReply === null) {
      throw new ChannelClosedError('Reply already sent');
    }
    this.sent = true;
    this.resolveReply(value);
  }

  public receive(): Promise<T> {
    return this.reply;
  }
}
