import type { StoredSettings } from './types'

export const DEFAULT_SETTINGS: StoredSettings = {
  port: 22,
  promptPattern: '[$#>] ?$',
  timeoutSeconds: 10,
  promptTimeoutSeconds: 3,
  pollIntervalMs: 250,
  connectTimeoutSeconds: 10,
  terminal: { term: 'vt220', rows: 40, cols: 500 },
  handoffHighWaterMark: 256,
  stripAnsi: false
}
