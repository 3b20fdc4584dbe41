// Stylesheet model for trellis - rules, simple selectors, values
// Simple selectors only: type, #id, .class in any combination (no combinators)

import { getClassSet, getElementId } from './dom.ts';
import type { ElementNode } from './dom.ts';

export type Unit = 'px';

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * A declared value. Callers switch on `kind`; they never compare CSS text.
 */
export type Value =
  | { readonly kind: 'keyword'; readonly keyword: string }
  | { readonly kind: 'length'; readonly value: number; readonly unit: Unit }
  | { readonly kind: 'color'; readonly color: Readonly<Color> };

export function keyword(name: string): Value {
  return { kind: 'keyword', keyword: name };
}

export function length(value: number, unit: Unit = 'px'): Value {
  return { kind: 'length', value, unit };
}

export function color(r: number, g: number, b: number, a = 255): Value {
  return { kind: 'color', color: { r, g, b, a } };
}

/**
 * Length in pixels; every other value counts as zero
 */
export function toPx(value: Value): number {
  return value.kind === 'length' ? value.value : 0;
}

export function isKeyword(value: Value, name: string): boolean {
  return value.kind === 'keyword' && value.keyword === name;
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'keyword':
      return b.kind === 'keyword' && a.keyword === b.keyword;
    case 'length':
      return b.kind === 'length' && a.value === b.value && a.unit === b.unit;
    case 'color':
      return b.kind === 'color' &&
        a.color.r === b.color.r && a.color.g === b.color.g &&
        a.color.b === b.color.b && a.color.a === b.color.a;
  }
}

/**
 * A compound of optional type, optional id and any number of classes,
 * e.g. "div#main.note.wide"
 */
export interface SimpleSelector {
  readonly kind: 'simple';
  readonly tagName?: string;
  readonly id?: string;
  readonly classes: ReadonlySet<string>;
}

export type Selector = SimpleSelector;

/**
 * [id count, class count, type count], compared left to right
 */
export type Specificity = readonly [number, number, number];

export interface Declaration {
  readonly property: string;
  readonly value: Value;
}

export interface Rule {
  readonly selectors: readonly Selector[];
  readonly declarations: readonly Declaration[];
}

/**
 * Ordered rules. Order only matters as the final cascade tie-break.
 */
export interface Stylesheet {
  readonly rules: readonly Rule[];
}

export function simpleSelector(parts: { tagName?: string; id?: string; classes?: Iterable<string> } = {}): SimpleSelector {
  return {
    kind: 'simple',
    tagName: parts.tagName,
    id: parts.id,
    classes: new Set(parts.classes ?? []),
  };
}

export function specificity(selector: Selector): Specificity {
  return [
    selector.id !== undefined ? 1 : 0,
    selector.classes.size,
    selector.tagName !== undefined ? 1 : 0,
  ];
}

export function compareSpecificity(a: Specificity, b: Specificity): number {
  return (a[0] - b[0]) || (a[1] - b[1]) || (a[2] - b[2]);
}

/**
 * Check if a selector matches an element.
 * All parts must match; a selector with no parts matches nothing.
 */
export function selectorMatches(selector: Selector, element: ElementNode): boolean {
  if (selector.tagName === undefined && selector.id === undefined && selector.classes.size === 0) {
    return false;
  }
  if (selector.tagName !== undefined && selector.tagName !== element.tagName) {
    return false;
  }
  if (selector.id !== undefined && selector.id !== getElementId(element)) {
    return false;
  }
  if (selector.classes.size > 0) {
    const elementClasses = getClassSet(element);
    for (const className of selector.classes) {
      if (!elementClasses.has(className)) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Most specific selector of the rule that matches, if any.
 * Selectors are kept sorted by descending specificity, so the first hit wins.
 */
export function firstMatchingSelector(rule: Rule, element: ElementNode): Selector | undefined {
  return rule.selectors.find(selector => selectorMatches(selector, element));
}

function hex2(n: number): string {
  return n.toString(16).padStart(2, '0');
}

/**
 * CSS text of a value
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'keyword':
      return value.keyword;
    case 'length':
      return `${value.value}${value.unit}`;
    case 'color': {
      const { r, g, b, a } = value.color;
      return `#${hex2(r)}${hex2(g)}${hex2(b)}${a === 255 ? '' : hex2(a)}`;
    }
  }
}

export function formatSelector(selector: Selector): string {
  let text = selector.tagName ?? '';
  if (selector.id !== undefined) {
    text += `#${selector.id}`;
  }
  for (const className of selector.classes) {
    text += `.${className}`;
  }
  return text || '*';
}
