export type ColorMode = 'auto' | 'always' | 'never'

export type ColorName = 'green' | 'yellow' | 'cyan' | 'blue' | 'red' | 'dim'

let mode: ColorMode = 'auto'

function supportsColor(): boolean {
  if (mode === 'always') return true
  if (mode === 'never') return false
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return false
  return Boolean(process.stdout && process.stdout.isTTY)
}

export function isColorMode(value: string): value is ColorMode {
  return value === 'auto' || value === 'always' || value === 'never'
}

export function setColorMode(m: ColorMode): void { mode = m }

/** SGR open and close codes per color. */
const CODES: Readonly<Record<ColorName, readonly [number, number]>> = {
  green: [32, 39],
  yellow: [33, 39],
  cyan: [96, 39],
  blue: [34, 39],
  red: [31, 39],
  dim: [2, 22]
}

export function colorize(kind: ColorName, text: string): string {
  if (!supportsColor()) return text
  const [open, close] = CODES[kind]
  return `\u001b[${open}m${text}\u001b[${close}m`
}
