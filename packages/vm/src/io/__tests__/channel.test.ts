import {
  ChannelClosedError,
  EndOfStreamError,
  type Word,
} from '@wordvm/types'
import { describe, expect, it } from 'vitest'
import { Channel, ChannelIO } from '../channel'

describe('Channel', () => {
  it('should deliver values in send order', async () => {
    const channel = new Channel<Word>()
    channel.send(1n)
    channel.send(2n)

    expect(await channel.receive()).toEqual([undefined, 1n])
    expect(await channel.receive()).toEqual([undefined, 2n])
    expect(channel.size).toBe(0)
  })

  it('should resolve a pending receive on the next send', async () => {
    const channel = new Channel<Word>()
    const pending = channel.receive()

    channel.send(5n)

    expect(await pending).toEqual([undefined, 5n])
    expect(channel.size).toBe(0)
  })

  it('should drain buffered values before reporting end of stream', async () => {
    const channel = new Channel<Word>('feed')
    channel.send(9n)
    channel.close()

    expect(await channel.receive()).toEqual([undefined, 9n])
    const [error] = await channel.receive()
    expect(error).toBeInstanceOf(EndOfStreamError)
    expect(error?.message).toBe('End of stream on feed')
  })

  it('should wake waiting receivers on close', async () => {
    const channel = new Channel<Word>()
    const first = channel.receive()
    const second = channel.receive()

    channel.close()

    expect((await first)[0]).toBeInstanceOf(EndOfStreamError)
    expect((await second)[0]).toBeInstanceOf(EndOfStreamError)
  })

  it('should reject sends after close', () => {
    const channel = new Channel<Word>('done')
    channel.close()
    channel.close()

    const [error] = channel.send(1n)

    expect(channel.isClosed).toBe(true)
    expect(error).toBeInstanceOf(ChannelClosedError)
    expect(error?.message).toBe('Send on closed channel done')
  })
})

describe('ChannelIO', () => {
  it('should read the inbound channel and write the outbound one', async () => {
    const inbound = new Channel<Word>()
    const outbound = new Channel<Word>()
    const io = new ChannelIO(inbound, outbound)
    inbound.send(3n)

    expect(await io.requestInput()).toEqual([undefined, 3n])
    expect(io.emitOutput(4n)).toEqual([undefined, true])
    expect(await outbound.receive()).toEqual([undefined, 4n])
  })
})
