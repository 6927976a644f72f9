export { ShellSession, openSession } from './main/shell-session'
export { ShellAgent } from './main/shell-agent'
export { HandoffChannel } from './main/handoff-channel'
export { StreamReader } from './main/stream-reader'
export { BufferedMatcher } from './main/buffered-matcher'
export type { MatchFinder, MatchHit } from './main/buffered-matcher'
export type { CompiledPattern } from './main/match-engine'
export {
  MatchEngine,
  compilePattern,
  literalFinder,
  regexFinder,
  regexListFinder,
} from './main/match-engine'
export {
  SessionError,
  ConnectionError,
  PromptNotFoundError,
  InvalidPatternError,
  LostConnectionError,
  ReadInProgressError,
} from './main/errors'
export type { SessionErrorCode } from './main/errors'
export { stripAnsi, stripCommandEcho } from './main/terminal-text'
export { connectSsh } from './main/transport/ssh-transport'
export { connectLocalShell } from './main/transport/pty-transport'
export { SettingsStore, resolveSessionSettings } from './main/store/settings-store'
export { DEFAULT_SETTINGS } from './shared/defaults'
export type {
  Connector,
  MatchPattern,
  MatchStatus,
  ReadResult,
  SessionOptions,
  SessionSettings,
  ShellChannel,
  StoredSettings,
  TerminalOptions,
} from './shared/types'
