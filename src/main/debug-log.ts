import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { homedir } from 'node:os'

const DEFAULT_LOG = join(homedir(), '.promptline', 'debug.log')

let disabled = false
let preparedDir: string | null = null

function resolveLogPath(): string | null {
  const override = process.env.PROMPTLINE_DEBUG_LOG
  if (override === 'off') return null
  return override || DEFAULT_LOG
}

export function debugLog(msg: string): void {
  if (disabled) return
  const file = resolveLogPath()
  if (!file) return
  try {
    const dir = dirname(file)
    if (dir !== preparedDir) {
      mkdirSync(dir, { recursive: true })
      preparedDir = dir
    }
    appendFileSync(file, `${new Date().toISOString()} ${msg}\n`)
  } catch {
    // Unwritable log location: stop trying for the rest of the process.
    disabled = true
  }
}

/** Re-enables logging after a failed write. */
export function resetDebugLog(): void {
  disabled = false
  preparedDir = null
}
