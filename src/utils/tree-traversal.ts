// Tree traversal utilities for document trees
// Consolidates common recursive traversal patterns

import type { DomNode, ElementNode } from '../dom.ts';

/**
 * Predicate function for filtering elements
 */
export type ElementPredicate = (element: ElementNode) => boolean;

/**
 * Find the first element matching a predicate (depth-first, document order)
 * @returns The first matching element, or null if not found
 */
export function findElement(root: DomNode, predicate: ElementPredicate): ElementNode | null {
  if (root.kind !== 'element') {
    return null;
  }
  if (predicate(root)) {
    return root;
  }
  for (const child of root.children) {
    const found = findElement(child, predicate);
    if (found) return found;
  }
  return null;
}

/**
 * Collect all elements matching a predicate in document order
 * @param result - Optional array to collect into
 */
export function collectElements(
  root: DomNode,
  predicate: ElementPredicate,
  result: ElementNode[] = []
): ElementNode[] {
  if (root.kind !== 'element') {
    return result;
  }
  if (predicate(root)) {
    result.push(root);
  }
  for (const child of root.children) {
    collectElements(child, predicate, result);
  }
  return result;
}

/**
 * Count nodes (elements and text) in a tree
 */
export function countNodes(root: DomNode): number {
  if (root.kind === 'text') {
    return 1;
  }
  let count = 1;
  for (const child of root.children) {
    count += countNodes(child);
  }
  return count;
}
