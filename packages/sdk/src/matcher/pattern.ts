/**
 * Gitignore-style path patterns, as used by CODEOWNERS.
 *
 * A pattern is translated once into an anchored regular expression.
 * Paths are repository-relative and use `/` as the only separator.
 * Translations are cached; past PATTERN_CACHE_LIMIT distinct patterns the
 * oldest entry is evicted.
 *
 * @module matcher/pattern
 */

export const PATTERN_CACHE_LIMIT = 512;

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/;

// null marks a pattern that never matches
const cache = new Map<string, RegExp | null>();

function escapeChar(ch: string): string {
  return REGEX_SPECIAL.test(ch) ? `\\${ch}` : ch;
}

/**
 * Translate `[...]` starting at `start`. Returns null when the class is
 * never closed, in which case the bracket is taken literally.
 */
function translateClass(segment: string, start: number): { regex: string; end: number } | null {
  let i = start + 1;
  let negated = false;
  if (segment[i] === '!' || segment[i] === '^') {
    negated = true;
    i++;
  }

  let body = '';
  // a leading ']' is a member, not the end of the class
  if (segment[i] === ']') {
    body += '\\]';
    i++;
  }

  while (i < segment.length && segment[i] !== ']') {
    const ch = segment[i];
    if (ch === '\\' && i + 1 < segment.length) {
      body += `\\${segment[i + 1]}`;
      i += 2;
      continue;
    }
    body += ch === '-' ? '-' : escapeChar(ch);
    i++;
  }

  if (i >= segment.length) return null;
  // a negated class still never matches the separator
  return { regex: negated ? `[^/${body}]` : `[${body}]`, end: i };
}

function translateSegment(segment: string): string {
  let out = '';
  for (let i = 0; i < segment.length; i++) {
    const ch = segment[i];

    if (ch === '\\' && i + 1 < segment.length) {
      out += escapeChar(segment[++i]);
    } else if (ch === '*') {
      while (segment[i + 1] === '*') i++;
      out += '[^/]*';
    } else if (ch === '?') {
      out += '[^/]';
    } else if (ch === '[') {
      const cls = translateClass(segment, i);
      if (cls) {
        out += cls.regex;
        i = cls.end;
      } else {
        out += '\\[';
      }
    } else {
      out += escapeChar(ch);
    }
  }
  return out;
}

/**
 * The regular expression for `pattern`, or null when the pattern can
 * never select a path (blank, comment, negation, bare `/`).
 */
export function compilePattern(pattern: string): RegExp | null {
  const cached = cache.get(pattern);
  if (cached !== undefined) return cached;

  const compiled = buildPattern(pattern);
  if (cache.size >= PATTERN_CACHE_LIMIT) {
    const oldest = cache.keys().next();
    if (!oldest.done) cache.delete(oldest.value);
  }
  cache.set(pattern, compiled);
  return compiled;
}

function buildPattern(source: string): RegExp | null {
  let p = source.trim();
  if (p === '' || p.startsWith('#') || p.startsWith('!')) {
    return null;
  }

  const directoryOnly = p.endsWith('/');
  p = p.replace(/\/+$/, '');

  // a slash anywhere but the end ties the pattern to the root
  const anchored = p.includes('/');
  p = p.replace(/^\/+/, '');
  if (p === '') {
    return null;
  }

  const segments = p.split('/').filter((s, i, all) => !(s === '**' && all[i - 1] === '**'));

  let body = '';
  segments.forEach((seg, i) => {
    const last = i === segments.length - 1;
    if (seg === '**') {
      if (i === 0 && last) body += '.+';
      else if (i === 0) body += '(?:.+/)?';
      else if (last) body += '/.*';
      else body += '(?:/.+)?';
      return;
    }
    if (i > 0 && !(i === 1 && segments[0] === '**')) body += '/';
    body += translateSegment(seg);
  });

  const prefix = anchored ? '^' : '^(?:.+/)?';
  const suffix = directoryOnly ? '/.*$' : '(?:/.*)?$';

  return new RegExp(prefix + body + suffix);
}

/**
 * Whether `filePath` is selected by the gitignore-style `pattern`.
 *
 * A pattern naming a directory selects every path below it; a pattern
 * ending in `/` selects only paths below it, never a file of that name.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  const regex = compilePattern(pattern);
  if (!regex) return false;
  return regex.test(filePath.replace(/^\/+/, ''));
}
