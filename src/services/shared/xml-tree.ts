/**
 * XML tree helpers over the DOM that cheerio parses into (domhandler nodes).
 *
 * The tree has no "replace this node by reference" primitive that keeps the
 * caller's handle valid, so `splice` rewrites a node's contents in place instead.
 */

import { Element, Text, hasChildren, isText, type AnyNode, type ChildNode } from 'domhandler';
import { append, appendChild, removeElement, replaceElement, textContent } from 'domutils';

/** Text of the node and all its descendants in document order, no separators */
export function fullText(node: AnyNode): string {
  return textContent(node);
}

/** Descendant text nodes in document order */
export function textNodes(node: AnyNode): Text[] {
  if (isText(node)) return [node];
  if (!hasChildren(node)) return [];
  return node.children.flatMap((child) => textNodes(child));
}

/** Build a detached element whose children are properly linked to it */
export function createElement(
  name: string,
  attribs: Record<string, string> = {},
  children: ChildNode[] = []
): Element {
  const element = new Element(name, { ...attribs });
  for (const child of children) {
    appendChild(element, child);
  }
  return element;
}

export function createText(data: string): Text {
  return new Text(data);
}

/**
 * Give `target` the tag, attributes and children of `source`.
 *
 * Anything that already holds `target` (its parent, a list of nodes found by a
 * previous query) sees the new content. Text following `target` belongs to its
 * parent and stays put. `source` is left as an empty shell.
 */
export function splice(source: Element, target: Element): void {
  target.name = source.name;
  target.attribs = { ...source.attribs };

  for (const child of [...target.children]) {
    removeElement(child);
  }
  for (const child of [...source.children]) {
    appendChild(target, child);
  }

  source.attribs = {};
}

/** Swap a node for a run of nodes at the same position */
export function replaceNode(node: ChildNode, replacements: ChildNode[]): void {
  if (replacements.length === 0) {
    removeElement(node);
    return;
  }

  const [first, ...rest] = replacements;
  replaceElement(node, first);

  let previous = first;
  for (const next of rest) {
    append(previous, next);
    previous = next;
  }
}

/** Join neighbouring text children so markers are not split across nodes */
export function mergeAdjacentText(parent: AnyNode): void {
  if (!hasChildren(parent)) return;

  let previous: ChildNode | null = null;
  for (const child of [...parent.children]) {
    if (previous && isText(previous) && isText(child)) {
      previous.data += child.data;
      removeElement(child);
      continue;
    }
    previous = child;
  }
}
