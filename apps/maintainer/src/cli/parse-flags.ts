export type Flags = Record<string, string | boolean>

/**
 * `--key value words --switch` into `{ key: 'value words', switch: true }`.
 * Tokens before the first flag are ignored.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/** Flags a command does not accept. */
export function unknownFlags(flags: Flags, allowed: readonly string[]): string[] {
  return Object.keys(flags).filter(key => !allowed.includes(key))
}
