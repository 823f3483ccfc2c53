import { describe, it, expect } from 'vitest'
import { ProgressChannel } from './progressChannel.js'

describe('ProgressChannel', () => {
  it('delivers buffered messages in send order', async () => {
    const channel = new ProgressChannel()
    channel.send('a', { type: 'update', progress: 0.5 })
    channel.send('b', { type: 'completed' })
    channel.send('a', { type: 'error', message: 'disk full' })

    expect(channel.pending).toBe(3)
    expect(await channel.receive()).toEqual({ taskId: 'a', event: { type: 'update', progress: 0.5 } })
    expect(await channel.receive()).toEqual({ taskId: 'b', event: { type: 'completed' } })
    expect(await channel.receive()).toEqual({ taskId: 'a', event: { type: 'error', message: 'disk full' } })
    expect(channel.pending).toBe(0)
  })

  it('resolves a waiting receiver when a message arrives', async () => {
    const channel = new ProgressChannel()
    const received = channel.receive()

    channel.send('task-1', { type: 'completed' })

    expect(await received).toEqual({ taskId: 'task-1', event: { type: 'completed' } })
    expect(channel.pending).toBe(0)
  })

  it('serves concurrent receivers one message each', async () => {
    const channel = new ProgressChannel()
    const first = channel.receive()
    const second = channel.receive()

    channel.send('x', { type: 'completed' })
    channel.send('y', { type: 'completed' })

    expect((await first)?.taskId).toBe('x')
    expect((await second)?.taskId).toBe('y')
  })

  it('drains buffered messages after close, then returns undefined', async () => {
    const channel = new ProgressChannel()
    channel.send('a', { type: 'completed' })
    channel.close()
    channel.send('b', { type: 'completed' })

    expect(channel.isClosed).toBe(true)
    expect((await channel.receive())?.taskId).toBe('a')
    expect(await channel.receive()).toBeUndefined()
  })

  it('wakes pending receivers on close', async () => {
    const channel = new ProgressChannel()
    const waiting = channel.receive()

    channel.close()

    expect(await waiting).toBeUndefined()
  })
})
