import type { MarkupDocument, MarkupElement } from '../../../markup/markup-document.js';

const INTERACTIVE_TAGS = new Set(['button', 'select', 'textarea', 'details', 'summary']);

const INTERACTIVE_ROLES = new Set([
  'button',
  'link',
  'checkbox',
  'radio',
  'switch',
  'tab',
  'menuitem',
  'menuitemcheckbox',
  'menuitemradio',
  'option',
  'slider',
  'combobox',
  'textbox',
]);

const NON_RENDERED_ANCESTORS = new Set(['head', 'template', 'script', 'style', 'noscript']);

export function isDisabled(el: MarkupElement): boolean {
  return el.attributes['disabled'] !== undefined || el.attributes['aria-disabled'] === 'true';
}

function hasHandlerAttribute(el: MarkupElement): boolean {
  return Object.keys(el.attributes).some((name) => name.startsWith('on') && name.length > 2);
}

export function isInteractive(el: MarkupElement): boolean {
  if (isDisabled(el)) return false;
  if (INTERACTIVE_TAGS.has(el.tag)) return true;
  if (el.tag === 'a') return el.attributes['href'] !== undefined;
  if (el.tag === 'input') return el.attributes['type']?.toLowerCase() !== 'hidden';
  if (hasHandlerAttribute(el)) return true;
  const role = el.attributes['role'];
  if (role !== undefined && INTERACTIVE_ROLES.has(role.toLowerCase())) return true;
  return el.classes.includes('cursor-pointer');
}

/**
 * Interactive elements in document order, excluding anything under a non-rendered container.
 */
export function discoverInteractive(doc: MarkupDocument): MarkupElement[] {
  return doc.elements.filter(
    (el) => isInteractive(el) && !doc.ancestors(el).some((a) => NON_RENDERED_ANCESTORS.has(a.tag)),
  );
}

export function hasInteractiveDescendant(doc: MarkupDocument, el: MarkupElement): boolean {
  return doc.descendants(el).some(isInteractive);
}
