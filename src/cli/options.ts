/**
 * @fileoverview Typed access to parsed CLI options.
 *
 * @module cli/options
 */

/**
 * An option that takes a value, by parsed key and the flags that set it.
 */
export interface ValueOption {
  key: string
  flags: readonly string[]
}

/**
 * Last value given for any of `flags` on the command line, from `--flag value`
 * or `--flag=value`. Scanning stops at `--`.
 */
function rawValue(args: readonly string[], flags: readonly string[]): string | undefined {
  let value: string | undefined
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--') break
    for (const flag of flags) {
      const next = args[i + 1]
      if (arg === flag && next !== undefined) {
        value = next
      } else if (arg.startsWith(`${flag}=`)) {
        value = arg.slice(flag.length + 1)
      }
    }
  }
  return value
}

/**
 * cac parses numeric-looking values into numbers, so `-m 007` arrives as 7.
 * Put the text the user typed back for every value option that came out as a
 * number.
 */
export function restoreNumericValues(
  args: readonly string[],
  options: Record<string, unknown>,
  valueOptions: readonly ValueOption[]
): void {
  for (const { key, flags } of valueOptions) {
    if (typeof options[key] !== 'number') continue
    const raw = rawValue(args, flags)
    if (raw !== undefined) {
      options[key] = raw
    }
  }
}

/**
 * Read an option that takes a value. A number becomes its decimal text and a
 * valueless flag (`true`) reads as absent.
 */
export function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key]
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number') {
    return String(value)
  }
  return undefined
}

export function flagOption(options: Record<string, unknown>, key: string): boolean {
  return options[key] === true
}
