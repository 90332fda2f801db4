import { colorize } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly debug: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly addRedactor: (pattern: string | RegExp) => void
}

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let noEmoji = false
let timestampsOn = false
let redactors: RegExp[] = []

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function toRegExp(p: string | RegExp): RegExp {
  return p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g')
}

function applyRedaction(msg: string): string {
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  if (!enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const redacted: string = applyRedaction(msg)
  // Leave pre-colored messages alone
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  // Data commands print their payload to stdout, so diagnostics stay on stderr
  const toStderr: boolean = kind !== 'info'
  // eslint-disable-next-line no-console
  console[toStderr ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

export const logger: Logger = {
  info: (msg: string): void => write('info', msg),
  warn: (msg: string): void => write('warn', msg),
  error: (msg: string): void => write('error', msg),
  debug: (msg: string): void => write('debug', msg),
  success: (msg: string): void => { const text = `${noEmoji ? '[ok]' : '✓'} ${msg}`; write('info', colorize('green', text)) },
  note: (msg: string): void => { const text = `${noEmoji ? '[note]' : '✱'} ${msg}`; write('info', colorize('blue', text)) },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map(toRegExp)
  },
  addRedactor: (pattern: string | RegExp): void => {
    if (typeof pattern === 'string' && pattern.length === 0) return
    redactors = [...redactors, toRegExp(pattern)]
  }
}
