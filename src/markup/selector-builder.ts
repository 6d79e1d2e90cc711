import type { MarkupDocument, MarkupElement } from './markup-document.js';

const SAFE_IDENT = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const MAX_CLASSES = 3;

function quoteAttributeValue(value: string): string | null {
  return /["\\\n]/.test(value) ? null : `"${value}"`;
}

/**
 * Produces a selector that matches exactly one element of a document.
 *
 * Preference order: id, a data attribute, tag with up to three plain classes,
 * then `:nth-of-type`, then the same under the parent's selector.
 */
export class SelectorBuilder {
  private readonly cache = new Map<number, string>();

  constructor(private readonly doc: MarkupDocument) {}

  selectorFor(el: MarkupElement): string {
    const cached = this.cache.get(el.index);
    if (cached !== undefined) return cached;
    const built = this.build(el);
    this.cache.set(el.index, built);
    return built;
  }

  private build(el: MarkupElement): string {
    const id = el.attributes['id'];
    if (id !== undefined && id.length > 0) {
      const quoted = quoteAttributeValue(id);
      const byId = SAFE_IDENT.test(id) ? `#${id}` : quoted !== null ? `[id=${quoted}]` : null;
      if (byId !== null && this.isUnique(byId, el)) return byId;
    }

    for (const [name, value] of Object.entries(el.attributes)) {
      if (!name.startsWith('data-') || !SAFE_IDENT.test(name)) continue;
      const quoted = quoteAttributeValue(value);
      if (quoted === null) continue;
      const byData = `${el.tag}[${name}=${quoted}]`;
      if (this.isUnique(byData, el)) return byData;
    }

    const base = this.baseSelector(el);
    if (this.isUnique(base, el)) return base;

    const nth = `${base}:nth-of-type(${this.nthOfType(el)})`;
    if (this.isUnique(nth, el)) return nth;

    const parent = this.doc.parent(el);
    if (!parent) return nth;
    return `${this.selectorFor(parent)} > ${nth}`;
  }

  private baseSelector(el: MarkupElement): string {
    const classes = el.classes.filter((cls) => SAFE_IDENT.test(cls)).slice(0, MAX_CLASSES);
    const tag = SAFE_IDENT.test(el.tag) ? el.tag : '*';
    return tag + classes.map((cls) => `.${cls}`).join('');
  }

  private nthOfType(el: MarkupElement): number {
    const sameTag = this.doc.elements.filter((c) => c.parentIndex === el.parentIndex && c.tag === el.tag);
    return sameTag.indexOf(el) + 1;
  }

  private isUnique(selector: string, el: MarkupElement): boolean {
    return this.doc.select(selector).match(
      (matched) => matched.length === 1 && matched[0] === el,
      () => false,
    );
  }
}
