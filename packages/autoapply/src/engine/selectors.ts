/**
 * Selector hints shared by the classifier and the executor.
 *
 * Precedence is fixed: id, then compound class selector, then data-testid,
 * then tag with name/type filters. An element with none of those is hinted
 * by its visible text, which the executor resolves as link text; a bare tag
 * is the last resort. Hints are advisory; the executor re-resolves them
 * through its own fallback chain.
 */

const SIMPLE_IDENT = /^[A-Za-z_][\w-]*$/;

export const MAX_TEXT_HINT = 80;

function escapeIdent(value: string): string {
  const escaped = value.replace(/[^\w-]/g, (ch) => `\\${ch}`);
  return /^\d/.test(escaped) ? `\\3${escaped[0]} ${escaped.slice(1)}` : escaped;
}

function quoteAttr(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function generateSelector(tag: string, attributes: Record<string, string>, text = ''): string {
  const id = attributes.id?.trim();
  if (id) {
    return SIMPLE_IDENT.test(id) ? `#${id}` : `[id='${quoteAttr(id)}']`;
  }

  const classes = (attributes.class ?? '').split(/\s+/).filter((c) => c.length > 0);
  if (classes.length > 0) {
    return `.${classes.map(escapeIdent).join('.')}`;
  }

  const testId = attributes['data-testid'];
  if (testId) {
    return `[data-testid='${quoteAttr(testId)}']`;
  }

  let selector = tag;
  for (const key of ['name', 'type']) {
    const value = attributes[key];
    if (value) selector += `[${key}='${quoteAttr(value)}']`;
  }
  if (selector !== tag) return selector;

  const visible = text.replace(/\s+/g, ' ').trim();
  return visible.length > 0 ? visible.slice(0, MAX_TEXT_HINT) : tag;
}

/** True when the hint is a bare word that can seed synthesized alternates. */
export function isSimpleHint(hint: string): boolean {
  return SIMPLE_IDENT.test(hint);
}
