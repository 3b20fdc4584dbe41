// Document tree produced by the HTML parser

export interface TextNode {
  readonly kind: 'text';
  readonly text: string;
}

export interface ElementNode {
  readonly kind: 'element';
  readonly tagName: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly DomNode[];
}

export type DomNode = TextNode | ElementNode;

export type AttributeInit = ReadonlyMap<string, string> | Record<string, string>;

export function createText(text: string): TextNode {
  return { kind: 'text', text };
}

/**
 * Create an element node. Attribute order is kept; a key given twice keeps its first value.
 */
export function createElement(
  tagName: string,
  attributes: AttributeInit = {},
  children: readonly DomNode[] = []
): ElementNode {
  const entries = attributes instanceof Map ? attributes.entries() : Object.entries(attributes);
  const map = new Map<string, string>();
  for (const [name, value] of entries) {
    if (!map.has(name)) {
      map.set(name, value);
    }
  }
  return { kind: 'element', tagName, attributes: map, children: [...children] };
}

export function isElement(node: DomNode): node is ElementNode {
  return node.kind === 'element';
}

export function isText(node: DomNode): node is TextNode {
  return node.kind === 'text';
}

export function getAttribute(element: ElementNode, name: string): string | undefined {
  return element.attributes.get(name);
}

export function getElementId(element: ElementNode): string | undefined {
  return element.attributes.get('id');
}

// Class sets are derived on first use and remembered per element
const classSetCache = new WeakMap<ElementNode, ReadonlySet<string>>();

/**
 * Whitespace-separated tokens of the `class` attribute
 */
export function getClassSet(element: ElementNode): ReadonlySet<string> {
  let classes = classSetCache.get(element);
  if (!classes) {
    const raw = element.attributes.get('class') ?? '';
    classes = new Set(raw.split(/\s+/).filter(name => name.length > 0));
    classSetCache.set(element, classes);
  }
  return classes;
}

export function hasClass(element: ElementNode, className: string): boolean {
  return getClassSet(element).has(className);
}

/**
 * Concatenated text of all descendant text nodes
 */
export function textContent(node: DomNode): string {
  if (node.kind === 'text') {
    return node.text;
  }
  return node.children.map(textContent).join('');
}
