import type { MatchPattern, ReadResult } from '../shared/types'
import type { BufferedMatcher, MatchFinder } from './buffered-matcher'
import { InvalidPatternError } from './errors'
import { debugLog } from './debug-log'

export interface CompiledPattern {
  pattern: RegExp
  index: number
}

/**
 * Compiles a pattern for repeated whole-buffer scans. Global and sticky
 * flags are dropped so that no `lastIndex` state leaks between polls.
 */
export function compilePattern(pattern: MatchPattern): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
  }
  try {
    return new RegExp(pattern)
  } catch (err) {
    throw new InvalidPatternError(pattern, err)
  }
}

export function literalFinder(target: string): MatchFinder {
  return (buffer) => {
    const start = buffer.indexOf(target)
    return start === -1 ? null : { end: start + target.length }
  }
}

export function regexFinder(pattern: RegExp): MatchFinder {
  return (buffer) => {
    const match = pattern.exec(buffer)
    return match ? { end: match.index + match[0].length } : null
  }
}

/**
 * Tries the patterns in list order on every scan. The first pattern that
 * matches anywhere wins, even when a later one matches earlier in the buffer.
 */
export function regexListFinder(patterns: readonly CompiledPattern[]): MatchFinder {
  return (buffer) => {
    for (const { pattern, index } of patterns) {
      const match = pattern.exec(buffer)
      if (match) return { end: match.index + match[0].length, patternIndex: index }
    }
    return null
  }
}

export class MatchEngine {
  constructor(private matcher: BufferedMatcher) {}

  readUntilLiteral(target: string, timeoutSeconds: number): Promise<ReadResult> {
    return this.matcher.readUntil(literalFinder(target), timeoutSeconds)
  }

  /** Rejects with InvalidPatternError before waiting if the pattern does not compile. */
  async readUntilRegex(pattern: MatchPattern, timeoutSeconds: number): Promise<ReadResult> {
    const compiled = compilePattern(pattern)
    return this.matcher.readUntil(regexFinder(compiled), timeoutSeconds)
  }

  /**
   * Patterns that fail to compile are skipped; the rest keep their position
   * in the list, and `patternIndex` refers to the caller's list.
   */
  readUntilRegexList(patterns: readonly MatchPattern[], timeoutSeconds: number): Promise<ReadResult> {
    const compiled: CompiledPattern[] = []
    patterns.forEach((pattern, index) => {
      try {
        compiled.push({ pattern: compilePattern(pattern), index })
      } catch (err) {
        if (!(err instanceof InvalidPatternError)) throw err
        debugLog(`[match] skipping pattern #${index}: ${err.message}`)
      }
    })
    return this.matcher.readUntil(regexListFinder(compiled), timeoutSeconds)
  }
}
