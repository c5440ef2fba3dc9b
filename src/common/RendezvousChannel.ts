import { ChannelClosedError } from './Errors';

interface PendingSend<T> {
  readonly value: T;
  readonly resolve: () => void;
  readonly reject: (err: Error) => void;
}

interface PendingReceive<T> {
  readonly resolve: (value: T) => void;
  readonly reject: (err: Error) => void;
}

/**
 * Unbuffered channel. `send()` settles only once a receiver has taken the
 * value, so a burst of senders waits in line behind a slow receiver.
 *
 * Ordering: when the receiver awaits `receive()` directly, its continuation
 * runs before the sender's. Whatever the receiver does synchronously with
 * the value has happened by the time `send()` resolves.
 */
export class RendezvousChannel<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private readonly createClosedError: () => Error;
  private closed: boolean = false;

  constructor(createClosedError: () => Error = () => new ChannelClosedError()) {
    this.createClosedError = createClosedError;
  }

  public send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(this.createClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(value);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  public receive(): Promise<T> {
    const sender = this.senders.shift();
    if (sender) {
      // Queued ahead of the receiver's continuation, so the sender's own
      // continuation lands behind it.
      queueMicrotask(sender.resolve);
      return Promise.resolve(sender.value);
    }

    if (this.closed) {
      return Promise.reject(this.createClosedError());
    }

    return new Promise((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * Rejects every parked sender and receiver. Later calls reject at once.
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.reject(this.createClosedError());
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(this.createClosedError());
    }
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public pendingSenders(): number {
    return this.senders.length;
  }
}
