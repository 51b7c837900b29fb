// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Single-reader message queue.
 *
 * Probe units post exactly one message each; only the aggregator reads.
 * Once closed, further posts are dropped, so a unit that reports after the
 * scan was finalised cannot touch the result.
 */
export class Mailbox<T> {
  private readonly queue: T[] = [];
  private waiter: ((message: T) => void) | undefined;
  private closed = false;

  /** Returns false when the message was dropped because the mailbox is closed. */
  post(message: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(message);
    } else {
      this.queue.push(message);
    }
    return true;
  }

  receive(): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Mailbox is closed'));
    }
    if (this.waiter) {
      return Promise.reject(new Error('Mailbox already has a pending reader'));
    }
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise<T>((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.closed = true;
    this.waiter = undefined;
    this.queue.length = 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
