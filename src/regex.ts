const INLINE_FLAGS_REGEX = /^\(\?([A-Za-z]+)\)/;
const GROUP_NAME_CHAR_REGEX = /[A-Za-z0-9_]/;
const ALPHANUMERIC_REGEX = /[A-Za-z0-9]/;

const SUPPORTED_INLINE_FLAGS = new Set(["i", "m", "s"]);

// Characters that keep their backslash under the `u` flag.
const SYNTAX_CHARS = new Set(["^", "$", "\\", ".", "*", "+", "?", "(", ")", "[", "]", "{", "}", "|", "/"]);

const WORD = String.raw`\p{Alphabetic}\p{M}\p{Nd}\p{Pc}\p{Join_Control}`;

const OUTSIDE_CLASS_ESCAPES: Record<string, string> = {
  w: `[${WORD}]`,
  W: `[^${WORD}]`,
  d: String.raw`\p{Nd}`,
  D: String.raw`\P{Nd}`,
  b: `(?:(?<=[${WORD}])(?![${WORD}])|(?<![${WORD}])(?=[${WORD}]))`,
  B: `(?:(?<=[${WORD}])(?=[${WORD}])|(?<![${WORD}])(?![${WORD}]))`,
};

const INSIDE_CLASS_ESCAPES: Record<string, string> = {
  w: WORD,
  d: String.raw`\p{Nd}`,
  D: String.raw`\P{Nd}`,
};

/**
 * Rewrites a pattern body so it compiles under the `u` flag with Unicode-aware classes.
 *
 * `\w`, `\d` and `\b` (and their negations) become Unicode property classes, escapes of
 * characters that need none (such as `\'`) lose their backslash, and `(?P<name>` becomes
 * `(?<name>`. `\W` inside a bracket class keeps its ASCII meaning.
 */
const translateSource = (source: string): string => {
  let output = "";
  let inClass = false;
  let position = 0;

  while (position < source.length) {
    const char = source[position];

    if (char === "\\" && position + 1 < source.length) {
      const next = source[position + 1];
      position += 2;
      if (ALPHANUMERIC_REGEX.test(next)) {
        const table = inClass ? INSIDE_CLASS_ESCAPES : OUTSIDE_CLASS_ESCAPES;
        output += table[next] ?? `\\${next}`;
      } else if (SYNTAX_CHARS.has(next) || (inClass && next === "-")) {
        output += `\\${next}`;
      } else {
        output += next;
      }
      continue;
    }

    if (inClass) {
      if (char === "]") inClass = false;
    } else if (char === "[") {
      inClass = true;
    } else if (source.startsWith("(?P<", position)) {
      output += "(?<";
      position += 4;
      continue;
    }
    output += char;
    position += 1;
  }

  return output;
};

/**
 * Compiles a pattern written in the Perl-like dialect operators configure with.
 *
 * Patterns always run with the `u` flag, so they match whole code points. A leading inline
 * flag group such as `(?i)` or `(?is)` becomes RegExp flags. Throws on unsupported inline
 * flags and on any syntax error RegExp reports.
 */
export const compilePattern = (expression: string, extraFlags = ""): RegExp => {
  const flags = new Set(extraFlags);
  flags.add("u");
  let source = expression;

  const inline = INLINE_FLAGS_REGEX.exec(source);
  if (inline) {
    for (const flag of inline[1]) {
      if (!SUPPORTED_INLINE_FLAGS.has(flag)) {
        throw new Error(`Unsupported inline flag '${flag}' in pattern ${expression}`);
      }
      flags.add(flag);
    }
    source = source.slice(inline[0].length);
  }

  return new RegExp(translateSource(source), [...flags].join(""));
};

const groupText = (match: RegExpMatchArray, reference: string): string => {
  if (/^[0-9]+$/.test(reference)) {
    return match[Number(reference)] ?? "";
  }
  return match.groups?.[reference] ?? "";
};

/**
 * Expands a replacement template against one match.
 *
 * `$1`, `${1}`, `$name` and `${name}` reference groups, `$$` is a literal dollar sign.
 * Unknown or non-participating groups expand to the empty string. `$name` consumes the
 * longest run of word characters, so `$1a` refers to a group named `1a`.
 */
export const expandTemplate = (template: string, match: RegExpMatchArray): string => {
  let output = "";
  let position = 0;

  while (position < template.length) {
    const char = template[position];
    if (char !== "$") {
      output += char;
      position += 1;
      continue;
    }

    const next = template[position + 1];
    if (next === "$") {
      output += "$";
      position += 2;
      continue;
    }

    if (next === "{") {
      const close = template.indexOf("}", position + 2);
      if (close > position + 2) {
        output += groupText(match, template.slice(position + 2, close));
        position = close + 1;
        continue;
      }
      output += "$";
      position += 1;
      continue;
    }

    let end = position + 1;
    while (end < template.length && GROUP_NAME_CHAR_REGEX.test(template[end])) {
      end += 1;
    }
    if (end === position + 1) {
      output += "$";
      position += 1;
      continue;
    }
    output += groupText(match, template.slice(position + 1, end));
    position = end;
  }

  return output;
};

/**
 * Returns group 1 of the first match, or the empty string when nothing matched or the
 * group did not take part in the match.
 */
export const captureFirstGroup = (text: string, pattern: RegExp): string => {
  const match = pattern.exec(text);
  if (match === null) return "";
  return match[1] ?? "";
};

/**
 * Replaces every match of a global `pattern` with the expanded `template`.
 */
export const replaceAllMatches = (text: string, pattern: RegExp, template: string): string => {
  let output = "";
  let lastIndex = 0;
  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    output += text.slice(lastIndex, index) + expandTemplate(template, match);
    lastIndex = index + match[0].length;
  }
  return output + text.slice(lastIndex);
};
