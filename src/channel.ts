import type { StreamOutcome } from "./types.js";

type Waiter = () => void;

class ChannelCore<T> {
  readonly queue: T[] = [];
  senderClosed = false;
  receiverClosed = false;
  outcome: StreamOutcome | null = null;
  private readonly spaceWaiters: Waiter[] = [];
  private readonly dataWaiters: Waiter[] = [];
  private settle: (outcome: StreamOutcome) => void = () => undefined;
  readonly closed: Promise<StreamOutcome>;

  constructor(readonly capacity: number) {
    this.closed = new Promise<StreamOutcome>((resolve) => {
      this.settle = resolve;
    });
  }

  waitForSpace(): Promise<void> {
    return new Promise((resolve) => this.spaceWaiters.push(resolve));
  }

  waitForData(): Promise<void> {
    return new Promise((resolve) => this.dataWaiters.push(resolve));
  }

  wakeSenders(): void {
    for (const wake of this.spaceWaiters.splice(0)) {
      wake();
    }
  }

  wakeReceivers(): void {
    for (const wake of this.dataWaiters.splice(0)) {
      wake();
    }
  }

  finish(outcome: StreamOutcome): void {
    if (this.senderClosed) {
      return;
    }

    this.senderClosed = true;
    this.outcome = outcome;
    this.settle(outcome);
    this.wakeReceivers();
    this.wakeSenders();
  }
}

export class Sender<T> {
  constructor(private readonly core: ChannelCore<T>) {}

  /**
   * Resolves true once the value is buffered, waiting while the channel is
   * full. Resolves false when the receiving end is gone.
   */
  async send(value: T): Promise<boolean> {
    const core = this.core;
    while (!core.receiverClosed && !core.senderClosed && core.queue.length >= core.capacity) {
      await core.waitForSpace();
    }

    if (core.receiverClosed || core.senderClosed) {
      return false;
    }

    core.queue.push(value);
    core.wakeReceivers();
    return true;
  }

  get isReceiverClosed(): boolean {
    return this.core.receiverClosed;
  }

  close(outcome: StreamOutcome): void {
    this.core.finish(outcome);
  }
}

export class Receiver<T> implements AsyncIterable<T> {
  constructor(private readonly core: ChannelCore<T>) {}

  /** Next value, or undefined at end of stream. */
  async receive(): Promise<T | undefined> {
    const core = this.core;
    while (core.queue.length === 0 && !core.senderClosed && !core.receiverClosed) {
      await core.waitForData();
    }

    if (core.receiverClosed) {
      return undefined;
    }

    const value = core.queue.shift();
    core.wakeSenders();
    return value;
  }

  close(): void {
    const core = this.core;
    if (core.receiverClosed) {
      return;
    }

    core.receiverClosed = true;
    core.queue.length = 0;
    core.wakeSenders();
    core.wakeReceivers();
  }

  get closed(): Promise<StreamOutcome> {
    return this.core.closed;
  }

  get outcome(): StreamOutcome | null {
    return this.core.outcome;
  }

  get buffered(): number {
    return this.core.queue.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const value = await this.receive();
      if (value === undefined) {
        return;
      }
      yield value;
    }
  }
}

export function createChannel<T>(capacity: number): [Sender<T>, Receiver<T>] {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const core = new ChannelCore<T>(capacity);
  return [new Sender(core), new Receiver(core)];
}

export async function takeBatch<T>(receiver: Receiver<T>, max: number): Promise<T[]> {
  const batch: T[] = [];
  while (batch.length < max) {
    const value = await receiver.receive();
    if (value === undefined) {
      break;
    }
    batch.push(value);
  }

  return batch;
}
