import { describe, it, expect, beforeEach } from 'vitest'
import {
  MatchEngine,
  compilePattern,
  literalFinder,
  regexFinder,
  regexListFinder,
} from './match-engine'
import { BufferedMatcher } from './buffered-matcher'
import { HandoffChannel } from './handoff-channel'
import { InvalidPatternError } from './errors'

describe('compilePattern', () => {
  it('compiles string patterns', () => {
    expect(compilePattern('\\$ $').test('user@host$ ')).toBe(true)
  })

  it('drops global and sticky flags but keeps the rest', () => {
    const compiled = compilePattern(/prompt>/giy)
    expect(compiled.flags).toBe('i')
  })

  it('throws InvalidPatternError for a pattern that does not parse', () => {
    expect(() => compilePattern('([unclosed')).toThrow(InvalidPatternError)
  })
})

describe('finders', () => {
  it('literalFinder ends after the first occurrence', () => {
    expect(literalFinder('--')('a--b--c')).toEqual({ end: 3 })
    expect(literalFinder('zz')('abc')).toBeNull()
  })

  it('regexFinder ends at the end of the first match', () => {
    expect(regexFinder(/\d+/)('abc 123 456')).toEqual({ end: 7 })
    expect(regexFinder(/\d+/)('abc')).toBeNull()
  })

  it('regexListFinder prefers list order over buffer position', () => {
    const find = regexListFinder([
      { pattern: /late/, index: 0 },
      { pattern: /early/, index: 1 },
    ])
    expect(find('early ... late')).toEqual({ end: 14, patternIndex: 0 })
  })

  it('regexFinder gives the same answer on every scan of a global pattern', () => {
    const find = regexFinder(compilePattern(/x/g))
    expect(find('axb')).toEqual({ end: 2 })
    expect(find('axb')).toEqual({ end: 2 })
  })
})

describe('MatchEngine', () => {
  let handoff: HandoffChannel
  let matcher: BufferedMatcher
  let engine: MatchEngine

  beforeEach(() => {
    handoff = new HandoffChannel()
    matcher = new BufferedMatcher(handoff, 10)
    engine = new MatchEngine(matcher)
  })

  describe('readUntilLiteral', () => {
    it('consumes the target and leaves what follows it', async () => {
      handoff.push('login: rest')

      const result = await engine.readUntilLiteral('login: ', 1)

      expect(result).toEqual({ output: 'login: ', status: 'matched' })
      expect(matcher.pending).toBe('rest')
    })

    it('does not hand the matched text to the next read', async () => {
      handoff.push('a>b>')

      const first = await engine.readUntilLiteral('>', 1)
      const second = await engine.readUntilLiteral('>', 1)

      expect(first.output).toBe('a>')
      expect(second.output).toBe('b>')
      expect(matcher.pending).toBe('')
    })

    it('finds a target split across two chunks', async () => {
      handoff.push('Password')
      handoff.push(': ')

      const result = await engine.readUntilLiteral('Password: ', 1)

      expect(result).toEqual({ output: 'Password: ', status: 'matched' })
    })

    it('returns the partial buffer with no-match on timeout', async () => {
      handoff.push('still working')

      const result = await engine.readUntilLiteral('DONE', 0.05)

      expect(result).toEqual({ output: 'still working', status: 'no-match' })
      expect(matcher.pending).toBe('')
    })
  })

  describe('readUntilRegex', () => {
    it('splits at the end of the match', async () => {
      handoff.push('total 0\nuser@box:~$ trailing')

      const result = await engine.readUntilRegex('\\$ ', 1)

      expect(result).toEqual({ output: 'total 0\nuser@box:~$ ', status: 'matched' })
      expect(matcher.pending).toBe('trailing')
    })

    it('accepts RegExp objects', async () => {
      handoff.push('CONTINUE? [y/N] ')

      const result = await engine.readUntilRegex(/\[y\/n\] $/i, 1)

      expect(result.status).toBe('matched')
      expect(result.output).toBe('CONTINUE? [y/N] ')
    })

    it('rejects an invalid pattern without waiting out the timeout', async () => {
      handoff.push('anything')
      const started = Date.now()

      await expect(engine.readUntilRegex('(*bad', 5)).rejects.toBeInstanceOf(InvalidPatternError)

      expect(Date.now() - started).toBeLessThan(1000)
      expect(matcher.pending).toBe('')
      expect(handoff.size).toBe(1)
    })
  })

  describe('readUntilRegexList', () => {
    it('reports the first pattern in list order when several match', async () => {
      handoff.push('Password: ... $ ')

      const result = await engine.readUntilRegexList(['\\$ $', 'Password: '], 1)

      expect(result).toEqual({ output: 'Password: ... $ ', status: 'matched', patternIndex: 0 })
    })

    it('uses the match end of the winning pattern', async () => {
      handoff.push('Password: ... $ ')

      const result = await engine.readUntilRegexList(['Password: ', '\\$ $'], 1)

      expect(result).toEqual({ output: 'Password: ', status: 'matched', patternIndex: 0 })
      expect(matcher.pending).toBe('... $ ')
    })

    it('falls through to later patterns', async () => {
      handoff.push('Are you sure? ')

      const result = await engine.readUntilRegexList(['\\$ $', 'sure\\? $'], 1)

      expect(result).toEqual({ output: 'Are you sure? ', status: 'matched', patternIndex: 1 })
    })

    it('skips invalid patterns and keeps the caller indexes', async () => {
      handoff.push('ok> ')

      const result = await engine.readUntilRegexList(['([', 'ok> $'], 1)

      expect(result).toEqual({ output: 'ok> ', status: 'matched', patternIndex: 1 })
    })

    it('times out with no-match when every pattern is invalid', async () => {
      handoff.push('text')

      const result = await engine.readUntilRegexList(['(', '['], 0.05)

      expect(result).toEqual({ output: 'text', status: 'no-match' })
    })
  })
})
