// Text dumps and JSON serialization of the DOM, styled and layout trees

import type { DomNode } from './dom.ts';
import { borderBox, marginBox, paddingBox } from './geometry.ts';
import type { Rect } from './geometry.ts';
import { boxNode } from './layout.ts';
import type { Box } from './layout.ts';
import type { StyledNode } from './style.ts';
import { formatValue } from './stylesheet.ts';

export { formatValue };

export interface SerializedBox {
  type: Box['boxType']['kind'];
  tagName?: string;
  text?: string;
  content: Rect;
  padding: Rect;
  border: Rect;
  margin: Rect;
  // Specified values as CSS text, by property name
  styles: Record<string, string>;
  children: SerializedBox[];
}

const INDENT = '  ';

function formatNumber(n: number): string {
  return String(Math.round(n * 100) / 100);
}

function formatRect(rect: Rect): string {
  return `x=${formatNumber(rect.x)} y=${formatNumber(rect.y)} w=${formatNumber(rect.width)} h=${formatNumber(rect.height)}`;
}

function nodeLabel(node: DomNode): string {
  return node.kind === 'element' ? node.tagName : `#text ${JSON.stringify(node.text)}`;
}

function sortedEntries<T>(map: ReadonlyMap<string, T>): [string, T][] {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Indented markup, one node per line:
 *
 *   <div class="a">
 *     "text"
 */
export function formatDom(node: DomNode, depth = 0): string {
  const pad = INDENT.repeat(depth);
  if (node.kind === 'text') {
    return pad + JSON.stringify(node.text);
  }
  const attributes = [...node.attributes.entries()]
    .map(([name, value]) => ` ${name}="${value.replace(/"/g, '&quot;')}"`)
    .join('');
  const lines = [`${pad}<${node.tagName}${attributes}>`];
  for (const child of node.children) {
    lines.push(formatDom(child, depth + 1));
  }
  return lines.join('\n');
}

/**
 * Indented tree with each element's specified values, e.g.
 * `div { display: block; width: 100px }`
 */
export function formatStyledTree(node: StyledNode, depth = 0): string {
  let line = INDENT.repeat(depth) + nodeLabel(node.node);
  if (node.specifiedValues.size > 0) {
    const declarations = sortedEntries(node.specifiedValues)
      .map(([property, value]) => `${property}: ${formatValue(value)}`)
      .join('; ');
    line += ` { ${declarations} }`;
  }
  return [line, ...node.children.map(child => formatStyledTree(child, depth + 1))].join('\n');
}

/**
 * Indented box tree with content rectangles, e.g.
 * `block div x=0 y=0 w=800 h=40`
 */
export function formatLayoutTree(box: Box, depth = 0): string {
  const node = boxNode(box);
  const label = node ? `${box.boxType.kind} ${nodeLabel(node.node)}` : box.boxType.kind;
  const line = `${INDENT.repeat(depth)}${label} ${formatRect(box.dimensions.content)}`;
  return [line, ...box.children.map(child => formatLayoutTree(child, depth + 1))].join('\n');
}

/**
 * JSON-compatible form of a layout tree for a paint collaborator
 */
export function serializeLayoutTree(box: Box): SerializedBox {
  const node = boxNode(box);
  const serialized: SerializedBox = {
    type: box.boxType.kind,
    content: { ...box.dimensions.content },
    padding: paddingBox(box.dimensions),
    border: borderBox(box.dimensions),
    margin: marginBox(box.dimensions),
    styles: {},
    children: box.children.map(serializeLayoutTree),
  };

  if (node) {
    if (node.node.kind === 'element') {
      serialized.tagName = node.node.tagName;
    } else {
      serialized.text = node.node.text;
    }
    for (const [property, value] of sortedEntries(node.specifiedValues)) {
      serialized.styles[property] = formatValue(value);
    }
  }
  return serialized;
}

export function layoutTreeToJson(box: Box): string {
  return JSON.stringify(serializeLayoutTree(box), null, 2);
}
