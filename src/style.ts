// Style resolution: match rules against the DOM and build the styled tree
// Cascade order is (specificity, stylesheet index, rule index), inline style last

import { getAttribute } from './dom.ts';
import type { DomNode, ElementNode } from './dom.ts';
import { parseDeclarationList } from './css-parser.ts';
import { getLogger } from './logging.ts';
import { color, compareSpecificity, firstMatchingSelector, keyword, length, specificity } from './stylesheet.ts';
import type { Rule, Specificity, Stylesheet, Value } from './stylesheet.ts';

const logger = getLogger('StyleResolver');

export type Display = 'block' | 'inline' | 'none';

/**
 * A DOM node paired with the values that won the cascade for it.
 * The tree mirrors the DOM one to one; text nodes carry no values.
 */
export interface StyledNode {
  readonly node: DomNode;
  readonly specifiedValues: ReadonlyMap<string, Value>;
  readonly children: readonly StyledNode[];
  readonly parent: StyledNode | null;
}

export interface MatchedRule {
  rule: Rule;
  specificity: Specificity;
  sheetIndex: number;
  ruleIndex: number;
}

/**
 * Properties that take the parent's value when the node declares none.
 * Every `font-*` property inherits too.
 */
export const INHERITED_PROPERTIES: ReadonlySet<string> = new Set([
  'color',
  'line-height',
  'text-align',
  'visibility',
  'white-space',
  'letter-spacing',
  'word-spacing',
  'list-style-type',
]);

export function isInherited(property: string): boolean {
  return INHERITED_PROPERTIES.has(property) || property.startsWith('font-');
}

/**
 * Initial values for properties nobody declared
 */
export const DEFAULT_VALUES: ReadonlyMap<string, Value> = new Map<string, Value>([
  ['display', keyword('inline')],
  ['width', keyword('auto')],
  ['height', keyword('auto')],
  ['margin', length(0)],
  ['margin-top', length(0)],
  ['margin-right', length(0)],
  ['margin-bottom', length(0)],
  ['margin-left', length(0)],
  ['padding', length(0)],
  ['padding-top', length(0)],
  ['padding-right', length(0)],
  ['padding-bottom', length(0)],
  ['padding-left', length(0)],
  ['border-width', length(0)],
  ['border-top-width', length(0)],
  ['border-right-width', length(0)],
  ['border-bottom-width', length(0)],
  ['border-left-width', length(0)],
  ['color', color(0, 0, 0)],
  ['background-color', keyword('transparent')],
  ['font-size', length(16)],
  ['font-weight', keyword('normal')],
  ['font-style', keyword('normal')],
  ['line-height', keyword('normal')],
  ['text-align', keyword('left')],
  ['visibility', keyword('visible')],
  ['white-space', keyword('normal')],
]);

const INITIAL = keyword('initial');

/**
 * Every rule with a selector matching the element, in cascade order:
 * lowest specificity first, source order breaking ties.
 */
export function matchingRules(element: ElementNode, stylesheets: readonly Stylesheet[]): MatchedRule[] {
  const matched: MatchedRule[] = [];

  stylesheets.forEach((sheet, sheetIndex) => {
    sheet.rules.forEach((rule, ruleIndex) => {
      const selector = firstMatchingSelector(rule, element);
      if (selector) {
        matched.push({ rule, specificity: specificity(selector), sheetIndex, ruleIndex });
      }
    });
  });

  return matched.sort((a, b) =>
    compareSpecificity(a.specificity, b.specificity) ||
    (a.sheetIndex - b.sheetIndex) ||
    (a.ruleIndex - b.ruleIndex)
  );
}

/**
 * Winning value per property for one element. Later writes overwrite earlier ones.
 */
export function specifiedValues(element: ElementNode, stylesheets: readonly Stylesheet[]): Map<string, Value> {
  const values = new Map<string, Value>();

  for (const { rule } of matchingRules(element, stylesheets)) {
    for (const declaration of rule.declarations) {
      values.set(declaration.property, declaration.value);
    }
  }

  const inline = getAttribute(element, 'style');
  if (inline) {
    for (const declaration of parseDeclarationList(inline)) {
      values.set(declaration.property, declaration.value);
    }
  }
  return values;
}

function styleNode(node: DomNode, stylesheets: readonly Stylesheet[], parent: StyledNode | null): StyledNode {
  const children: StyledNode[] = [];
  const styled: StyledNode = {
    node,
    specifiedValues: node.kind === 'element' ? specifiedValues(node, stylesheets) : new Map(),
    children,
    parent,
  };
  if (node.kind === 'element') {
    for (const child of node.children) {
      children.push(styleNode(child, stylesheets, styled));
    }
  }
  return styled;
}

/**
 * Build the styled tree for a DOM tree
 */
export function resolveStyles(root: DomNode, stylesheets: readonly Stylesheet[]): StyledNode {
  const styled = styleNode(root, stylesheets, null);
  if (logger.isDebugEnabled()) {
    logger.debug('Resolved styles', {
      stylesheets: stylesheets.length,
      rules: stylesheets.reduce((sum, sheet) => sum + sheet.rules.length, 0),
    });
  }
  return styled;
}

export function specifiedValue(node: StyledNode, property: string): Value | undefined {
  return node.specifiedValues.get(property);
}

/**
 * Value of a property after inheritance and defaults. Never undefined:
 * unknown properties nobody declared are `initial`.
 */
export function computedValue(node: StyledNode, property: string): Value {
  const own = node.specifiedValues.get(property);
  if (own) {
    return own;
  }
  if (isInherited(property)) {
    for (let ancestor = node.parent; ancestor; ancestor = ancestor.parent) {
      const inherited = ancestor.specifiedValues.get(property);
      if (inherited) {
        return inherited;
      }
    }
  }
  return DEFAULT_VALUES.get(property) ?? INITIAL;
}

/**
 * Longhand, then shorthand, then the given default.
 * e.g. lookupValue(node, 'margin-left', 'margin', length(0))
 */
export function lookupValue(node: StyledNode, name: string, fallbackName: string, defaultValue: Value): Value {
  return node.specifiedValues.get(name) ?? node.specifiedValues.get(fallbackName) ?? defaultValue;
}

export function display(node: StyledNode): Display {
  if (node.node.kind === 'text') {
    return 'inline';
  }
  const value = node.specifiedValues.get('display');
  if (value?.kind === 'keyword') {
    switch (value.keyword) {
      case 'block':
      case 'inline':
      case 'none':
        return value.keyword;
    }
  }
  return node.parent === null ? 'block' : 'inline';
}
