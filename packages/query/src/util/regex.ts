export type RegexValue = {
  pattern: string;
  /** Raw `$options` string, or null when the query did not supply one. */
  options: string | null;
};

const SUPPORTED_FLAGS = ["i", "m", "s"] as const;

// Leading group such as (?i) or (?ms)
const INLINE_FLAGS = /^\(\?([ims]+)\)/;

function pickFlags(requested: string): string[] {
  const lower = requested.toLowerCase();
  return SUPPORTED_FLAGS.filter((flag) => lower.includes(flag));
}

/**
 * Bare `$regex` conditions always match case-insensitively. When `$options`
 * is given, only the flags it names are applied.
 */
export function regexFlags(options: string | null): string {
  if (options === null) {
    return "i";
  }
  return pickFlags(options).join("");
}

/**
 * Moves a leading inline flag group into the flag list, so "(?i)vinca"
 * compiles as /vinca/i.
 */
export function splitInlineFlags(pattern: string): {
  source: string;
  flags: string[];
} {
  const match = INLINE_FLAGS.exec(pattern);
  if (!match) {
    return { source: pattern, flags: [] };
  }
  return { source: pattern.slice(match[0].length), flags: pickFlags(match[1]) };
}

const compiled = new WeakMap<RegexValue, RegExp>();

export function compileRegex(value: RegexValue): RegExp {
  let regex = compiled.get(value);
  if (!regex) {
    const { source, flags } = splitInlineFlags(value.pattern);
    const allFlags = new Set([...regexFlags(value.options), ...flags]);
    regex = new RegExp(source, [...allFlags].join(""));
    compiled.set(value, regex);
  }
  return regex;
}
