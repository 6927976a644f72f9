import * as fs from 'node:fs'
import * as path from 'node:path'
import * as os from 'node:os'
import type { SessionOptions, SessionSettings, StoredSettings, TerminalOptions } from '../../shared/types'
import { DEFAULT_SETTINGS } from '../../shared/defaults'

const CONFIG_DIR = path.join(os.homedir(), '.promptline')
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function pickTerminal(value: unknown, fallback: TerminalOptions): TerminalOptions {
  if (!isRecord(value)) return { ...fallback }
  return {
    term: typeof value.term === 'string' ? value.term : fallback.term,
    rows: typeof value.rows === 'number' ? value.rows : fallback.rows,
    cols: typeof value.cols === 'number' ? value.cols : fallback.cols,
  }
}

/**
 * Keeps only known settings whose type matches the default. Anything else
 * in the file, credentials included, is ignored.
 */
function sanitize(raw: Record<string, unknown>): StoredSettings {
  const settings: StoredSettings = { ...DEFAULT_SETTINGS, terminal: pickTerminal(raw.terminal, DEFAULT_SETTINGS.terminal) }
  const numericKeys = [
    'port',
    'timeoutSeconds',
    'promptTimeoutSeconds',
    'pollIntervalMs',
    'connectTimeoutSeconds',
    'handoffHighWaterMark',
  ] as const
  for (const key of numericKeys) {
    const value = raw[key]
    if (typeof value === 'number') settings[key] = value
  }
  if (typeof raw.promptPattern === 'string') settings.promptPattern = raw.promptPattern
  if (typeof raw.stripAnsi === 'boolean') settings.stripAnsi = raw.stripAnsi
  if (typeof raw.shell === 'string') settings.shell = raw.shell
  return settings
}

export class SettingsStore {
  private settings: StoredSettings

  constructor(private configFile = CONFIG_FILE) {
    this.settings = this.loadFromDisk()
  }

  private loadFromDisk(): StoredSettings {
    try {
      if (!fs.existsSync(this.configFile)) {
        return sanitize({})
      }
      const raw = fs.readFileSync(this.configFile, 'utf-8')
      const parsed: unknown = JSON.parse(raw)
      if (!isRecord(parsed)) {
        return sanitize({})
      }
      return sanitize(parsed)
    } catch {
      return sanitize({})
    }
  }

  private writeToDisk(): void {
    fs.mkdirSync(path.dirname(this.configFile), { recursive: true })
    fs.writeFileSync(this.configFile, JSON.stringify(this.settings, null, 2), 'utf-8')
  }

  getSettings(): StoredSettings {
    return { ...this.settings, terminal: { ...this.settings.terminal } }
  }

  updateSettings(partial: Partial<StoredSettings>): StoredSettings {
    this.settings = sanitize({ ...this.settings, ...partial })
    this.writeToDisk()
    return this.getSettings()
  }
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`)
  }
}

/**
 * Merges explicit options over stored (or built-in) defaults and checks the
 * result before anything connects.
 */
export function resolveSessionSettings(options: SessionOptions, stored: StoredSettings = DEFAULT_SETTINGS): SessionSettings {
  const settings: SessionSettings = {
    ...stored,
    ...options,
    terminal: { ...stored.terminal, ...options.terminal },
  }

  if (!settings.host.trim()) throw new Error('host is required')
  if (!Number.isInteger(settings.port) || settings.port < 1 || settings.port > 65535) {
    throw new Error(`port must be an integer between 1 and 65535, got ${settings.port}`)
  }
  assertPositive('timeoutSeconds', settings.timeoutSeconds)
  assertPositive('promptTimeoutSeconds', settings.promptTimeoutSeconds)
  assertPositive('pollIntervalMs', settings.pollIntervalMs)
  assertPositive('connectTimeoutSeconds', settings.connectTimeoutSeconds)
  assertPositive('handoffHighWaterMark', settings.handoffHighWaterMark)

  return settings
}
