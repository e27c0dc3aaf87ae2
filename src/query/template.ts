export type TemplatePart =
  | { kind: 'text'; text: string }
  | { kind: 'slot'; name: string };

export interface Substitution {
  text: string;
  /** Slots with no value, in order of first appearance. Left as written in `text`. */
  missing: string[];
  /** Slots that received a value, in order of first appearance. */
  used: string[];
}

export interface SubstituteOptions {
  /** Drop a `where` keyword directly followed by a slot that renders empty. */
  omitEmptyWhere?: boolean;
}

const SLOT_PATTERN = /\{:([A-Za-z_][A-Za-z0-9_]*):\}/g;
const TRAILING_WHERE = /\s*\bwhere\s*$/i;

export function slot(name: string): string {
  return `{:${name}:}`;
}

/** Splits a template into literal text and `{:name:}` slots. */
export function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let last = 0;
  for (const match of template.matchAll(SLOT_PATTERN)) {
    const index = match.index ?? 0;
    if (index > last) {
      parts.push({ kind: 'text', text: template.slice(last, index) });
    }
    parts.push({ kind: 'slot', name: match[1] ?? '' });
    last = index + match[0].length;
  }
  if (last < template.length) {
    parts.push({ kind: 'text', text: template.slice(last) });
  }
  return parts;
}

/** Distinct slot names in order of first appearance. */
export function listSlots(template: string): string[] {
  const names = new Set<string>();
  for (const part of parseTemplate(template)) {
    if (part.kind === 'slot') names.add(part.name);
  }
  return [...names];
}

/**
 * Single pass over the template: every slot is replaced by `lookup(name)`.
 * Values are inserted as is; slots appearing inside a value are not expanded.
 */
export function substituteSlots(
  template: string,
  lookup: (name: string) => string | undefined,
  options: SubstituteOptions = {},
): Substitution {
  const missing = new Set<string>();
  const used = new Set<string>();
  let text = '';

  for (const part of parseTemplate(template)) {
    if (part.kind === 'text') {
      text += part.text;
      continue;
    }
    const value = lookup(part.name);
    if (value === undefined) {
      missing.add(part.name);
      text += slot(part.name);
      continue;
    }
    used.add(part.name);
    if (options.omitEmptyWhere === true && value.trim() === '' && TRAILING_WHERE.test(text)) {
      text = text.replace(TRAILING_WHERE, '');
      continue;
    }
    text += value;
  }

  return { text, missing: [...missing], used: [...used] };
}
