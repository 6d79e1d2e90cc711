import { parseDocument } from 'htmlparser2';
import type { AnyNode, Document, Element } from 'domhandler';
import { isTag } from 'domhandler';
import * as DomUtils from 'domutils';
import { selectAll } from 'css-select';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export interface MarkupElement {
  /** Position in document order. */
  readonly index: number;
  readonly node: Element;
  readonly tag: string;
  readonly classes: readonly string[];
  readonly attributes: Readonly<Record<string, string>>;
  readonly parentIndex: number | null;
  /** Source offset of the element's `<`. */
  readonly startIndex: number;
}

export type SelectorError = { readonly code: 'INVALID_SELECTOR'; readonly selector: string; readonly message: string };

export function splitClasses(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Parsed, read-only view over a markup string.
 *
 * Elements keep their source offsets so edits can be spliced into the original text.
 */
export class MarkupDocument {
  private readonly byNode: Map<Element, MarkupElement>;

  private constructor(
    readonly source: string,
    private readonly root: Document,
    readonly elements: readonly MarkupElement[],
  ) {
    this.byNode = new Map(elements.map((el) => [el.node, el]));
  }

  static parse(source: string): MarkupDocument {
    const root = parseDocument(source, { withStartIndices: true, withEndIndices: true });
    const nodes = DomUtils.findAll(() => true, root.children);
    const indexOf = new Map(nodes.map((node, index) => [node, index]));

    const elements = nodes.map((node, index): MarkupElement => {
      const parent = node.parent !== null && isTag(node.parent) ? indexOf.get(node.parent) ?? null : null;
      return {
        index,
        node,
        tag: node.name,
        classes: splitClasses(node.attribs['class']),
        attributes: node.attribs,
        parentIndex: parent,
        startIndex: node.startIndex ?? 0,
      };
    });

    return new MarkupDocument(source, root, elements);
  }

  select(selector: string): Result<MarkupElement[], SelectorError> {
    let nodes: Element[];
    try {
      nodes = selectAll<AnyNode, Element>(selector, this.root);
    } catch (e) {
      return err({
        code: 'INVALID_SELECTOR',
        selector,
        message: e instanceof Error ? e.message : String(e),
      });
    }
    const matched: MarkupElement[] = [];
    for (const node of nodes) {
      const el = this.byNode.get(node);
      if (el) matched.push(el);
    }
    return ok(matched);
  }

  parent(el: MarkupElement): MarkupElement | null {
    return el.parentIndex === null ? null : this.elements[el.parentIndex] ?? null;
  }

  /** Nearest first. */
  ancestors(el: MarkupElement): MarkupElement[] {
    const out: MarkupElement[] = [];
    let current = this.parent(el);
    while (current) {
      out.push(current);
      current = this.parent(current);
    }
    return out;
  }

  children(el: MarkupElement): MarkupElement[] {
    return this.elements.filter((candidate) => candidate.parentIndex === el.index);
  }

  siblings(el: MarkupElement): MarkupElement[] {
    return this.elements.filter((candidate) => candidate.parentIndex === el.parentIndex && candidate !== el);
  }

  descendants(el: MarkupElement): MarkupElement[] {
    return DomUtils.findAll(() => true, el.node.children).flatMap((node) => {
      const found = this.byNode.get(node);
      return found ? [found] : [];
    });
  }

  isAncestorOf(ancestor: MarkupElement, el: MarkupElement): boolean {
    return this.ancestors(el).includes(ancestor);
  }

  textOf(el: MarkupElement): string {
    return DomUtils.textContent(el.node);
  }

  /** Bodies of inline scripts (no `src`), in document order. */
  inlineScripts(): { readonly element: MarkupElement; readonly body: string }[] {
    return this.elements
      .filter((el) => el.tag === 'script' && el.attributes['src'] === undefined)
      .map((element) => ({ element, body: this.textOf(element) }));
  }

  /** Tag names in document order; two documents with equal shapes have the same element tree. */
  shape(): string {
    return this.elements.map((el) => `${el.parentIndex ?? '-'}:${el.tag}`).join(',');
  }
}
