import {
  ChannelClosedError,
  EndOfStreamError,
  type IOCapability,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'

type Waiter<T> = (result: Safe<T>) => void

/**
 * Unbounded FIFO channel with one producer and one consumer
 *
 * `send` never blocks. `receive` resolves with the oldest buffered value,
 * waits for the next send, or reports end of stream once the producer has
 * closed the channel and the buffer is drained.
 */
export class Channel<T = Word> {
  private readonly buffer: T[] = []
  private readonly waiters: Waiter<T>[] = []
  private closed = false

  constructor(readonly name = 'channel') {}

  get size(): number {
    return this.buffer.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  send(value: T): Safe<true> {
    if (this.closed) {
      return safeError(new ChannelClosedError(this.name))
    }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter(safeResult(value))
    } else {
      this.buffer.push(value)
    }
    return safeResult<true>(true)
  }

  receive(): SafePromise<T> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1)
      return Promise.resolve(safeResult(value))
    }
    if (this.closed) {
      return Promise.resolve(safeError(new EndOfStreamError(this.name)))
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  /**
   * Producer side: no more values will be sent. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter(safeError(new EndOfStreamError(this.name)))
    }
  }
}

/**
 * Channel-bound I/O: input from the inbound channel, output to the outbound
 */
export class ChannelIO implements IOCapability {
  constructor(
    private readonly inbound: Channel<Word>,
    private readonly outbound: Channel<Word>,
  ) {}

  requestInput(): SafePromise<Word> {
    return this.inbound.receive()
  }

  emitOutput(value: Word): Safe<true> {
    return this.outbound.send(value)
  }
}
