const REGEX_SPECIALS = /[.+^${}()|[\]\\]/g;

export interface GlobOptions {
  /** Require the whole candidate to match instead of any substring of it. */
  anchored?: boolean;
}

/**
 * Compiles a simple glob (`*` = any run of characters, `?` = one character)
 * into a RegExp. Every other character is literal.
 *
 * Unanchored patterns match anywhere in the candidate, so `*.log` excludes
 * `/var/app.log.1` and `tmp` excludes every path with a `tmp` directory.
 */
export function globToRegExp(glob: string, options: GlobOptions = {}): RegExp {
  const body = glob
    .replace(REGEX_SPECIALS, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(options.anchored ? `^${body}$` : body);
}
