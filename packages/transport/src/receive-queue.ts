/**
 * Buffers inbound chunks from a socket until a caller asks for them.
 *
 * Sockets deliver data through events; the protocol reads one response at a
 * time. A chunk that arrives with nobody waiting is kept for the next
 * `next()` call. A timed-out `next()` leaves the queue (and the socket
 * behind it) usable.
 */

import { ReadTimeoutError } from '@zklink/utils/errors';

interface Waiter {
  resolve: (chunk: Buffer) => void;
  reject: (err: Error) => void;
  timeoutHandle: NodeJS.Timeout;
}

export class ReceiveQueue {
  private chunks: Buffer[] = [];
  private waiters: Waiter[] = [];
  private failure?: Error;

  /** Chunks received but not yet taken */
  get pending(): number {
    return this.chunks.length;
  }

  push(chunk: Buffer): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timeoutHandle);
      waiter.resolve(chunk);
      return;
    }
    this.chunks.push(chunk);
  }

  /**
   * Reject current waiters and every later `next()` once buffered chunks
   * are drained. The first failure wins.
   */
  fail(err: Error): void {
    if (!this.failure) {
      this.failure = err;
    }
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timeoutHandle);
      waiter.reject(this.failure);
    }
  }

  /** Drop buffered data and any recorded failure. */
  reset(): void {
    this.chunks = [];
    this.failure = undefined;
  }

  next(timeoutMs: number): Promise<Buffer> {
    const chunk = this.chunks.shift();
    if (chunk) {
      return Promise.resolve(chunk);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timeoutHandle: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new ReadTimeoutError(timeoutMs));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }
}
