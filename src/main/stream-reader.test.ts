import { describe, it, expect, beforeEach } from 'vitest'
import { StreamReader } from './stream-reader'
import { HandoffChannel } from './handoff-channel'
import { StubShellChannel } from './testing/stub-shell'

describe('StreamReader', () => {
  let channel: StubShellChannel
  let handoff: HandoffChannel

  beforeEach(() => {
    channel = new StubShellChannel()
    handoff = new HandoffChannel(3)
  })

  function drain(): string[] {
    const chunks: string[] = []
    for (let chunk = handoff.tryReceive(); chunk !== undefined; chunk = handoff.tryReceive()) {
      chunks.push(chunk)
    }
    return chunks
  }

  it('forwards each data event as one chunk, in order', () => {
    new StreamReader(channel, handoff).start()
    channel.emit('ab')
    channel.emit('cd')
    channel.emit('ef')

    expect(drain()).toEqual(['ab', 'cd', 'ef'])
  })

  it('skips empty reads', () => {
    const reader = new StreamReader(channel, handoff)
    reader.start()
    channel.emit('')
    channel.emit('x')

    expect(drain()).toEqual(['x'])
    expect(reader.totalRead).toBe(1)
  })

  it('pauses the stream at the high water mark and resumes on drain', () => {
    new StreamReader(channel, handoff).start()
    channel.emit('1')
    channel.emit('2')
    expect(channel.paused).toBe(false)

    channel.emit('3')
    expect(channel.paused).toBe(true)

    handoff.tryReceive()
    expect(channel.paused).toBe(false)
  })

  it('closes the handoff when the stream ends', () => {
    const reader = new StreamReader(channel, handoff)
    reader.start()
    channel.emit('last words')
    channel.end()

    expect(handoff.isClosed).toBe(true)
    expect(handoff.reason).toBeUndefined()
    expect(drain()).toEqual(['last words'])
  })

  it('passes the stream error on as the close reason', () => {
    new StreamReader(channel, handoff).start()
    const error = new Error('connection reset')
    channel.end(error)

    expect(handoff.reason).toBe(error)
  })

  it('attaches only once', () => {
    const reader = new StreamReader(channel, handoff)
    reader.start()
    reader.start()
    channel.emit('once')

    expect(drain()).toEqual(['once'])
  })
})
