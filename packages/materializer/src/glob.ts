/**
 * Minimal glob matching for layout selectors (`dependency:x:N/<pattern>`).
 *
 * - `*` matches within one path segment
 * - `**` matches any number of segments
 * - `?` matches one character other than `/`
 */

/**
 * Compile a pattern. Callers matching many paths compile once and reuse it.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ''
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i)
    if (ch === '*') {
      if (pattern.charAt(i + 1) === '*') {
        // `**/` also matches zero directories
        if (pattern.charAt(i + 2) === '/') {
          source += '(?:.*/)?'
          i += 2
        } else {
          source += '.*'
          i += 1
        }
      } else {
        source += '[^/]*'
      }
    } else if (ch === '?') {
      source += '[^/]'
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&')
    }
  }

  return new RegExp(`^${source}$`)
}

export function matchGlob(pattern: string, path: string): boolean {
  return globToRegExp(pattern).test(path)
}
