export type LinePredicate = (line: string) => boolean

const REGEX_SPECIAL = /[\\^$.*+?()[\]{}|/]/

const escapeChar = (char: string): string => (REGEX_SPECIAL.test(char) ? `\\${char}` : char)

/**
 * Translates a shell-style pattern into an anchored expression.
 * `*` matches any run of characters, `?` one character, `[abc]` / `[!abc]`
 * a character class. An unterminated `[` is taken literally.
 */
export const globToRegExp = (pattern: string): RegExp => {
  let source = ""
  let index = 0
  while (index < pattern.length) {
    const char = pattern.charAt(index)
    index += 1
    if (char === "*") {
      source += ".*"
    } else if (char === "?") {
      source += "."
    } else if (char === "[") {
      let end = index
      if (pattern.charAt(end) === "!") end += 1
      if (pattern.charAt(end) === "]") end += 1
      while (end < pattern.length && pattern.charAt(end) !== "]") end += 1
      if (end >= pattern.length) {
        source += "\\["
        continue
      }
      let body = pattern.slice(index, end).replace(/\\/g, "\\\\").replace(/]/g, "\\]")
      index = end + 1
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`
      } else if (body.startsWith("^")) {
        body = `\\${body}`
      }
      source += `[${body}]`
    } else {
      source += escapeChar(char)
    }
  }

  return new RegExp(`^${source}$`, "s")
}

export const matchGlob = (pattern: string, line: string): boolean => globToRegExp(pattern).test(line)

export const equalsLine =
  (expected: string): LinePredicate =>
  (line) =>
    line === expected

/** Compiles the pattern once for a whole scan. */
export const globLine = (pattern: string): LinePredicate => {
  const regex = globToRegExp(pattern)
  return (line) => regex.test(line)
}

export const containsText =
  (fragment: string): LinePredicate =>
  (line) =>
    line.includes(fragment)

export const startsWithText =
  (prefix: string): LinePredicate =>
  (line) =>
    line.startsWith(prefix)
