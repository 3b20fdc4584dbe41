// Block layout engine
// Builds the box tree from the styled tree and positions it in a containing block

import { LayoutInputError } from './errors.ts';
import { borderBox, cloneDimensions, emptyDimensions, marginBox, pointInRect } from './geometry.ts';
import type { Dimensions } from './geometry.ts';
import { getLogger } from './logging.ts';
import { computedValue, display, lookupValue } from './style.ts';
import type { StyledNode } from './style.ts';
import { isKeyword, length, toPx } from './stylesheet.ts';
import type { Value } from './stylesheet.ts';

const logger = getLogger('LayoutEngine');

const ZERO = length(0);

export type BoxType =
  | { readonly kind: 'block'; readonly node: StyledNode }
  | { readonly kind: 'inline'; readonly node: StyledNode }
  | { readonly kind: 'anonymous' };

export interface Box {
  boxType: BoxType;
  dimensions: Dimensions;
  children: Box[];
}

// Height is irrelevant: block layout grows downward from zero
export interface Viewport {
  width: number;
}

function createBox(boxType: BoxType): Box {
  return { boxType, dimensions: emptyDimensions(), children: [] };
}

/**
 * Styled node behind a box; anonymous boxes have none
 */
export function boxNode(box: Box): StyledNode | null {
  return box.boxType.kind === 'anonymous' ? null : box.boxType.node;
}

/**
 * Box tree for a styled tree. `display: none` drops the node and its subtree;
 * a hidden root yields an empty anonymous box.
 */
export function buildLayoutTree(root: StyledNode): Box {
  switch (display(root)) {
    case 'none':
      return createBox({ kind: 'anonymous' });
    case 'block':
      return buildBox(root, { kind: 'block', node: root });
    case 'inline':
      return buildBox(root, { kind: 'inline', node: root });
  }
}

function buildBox(node: StyledNode, boxType: BoxType): Box {
  const box = createBox(boxType);
  const visible = node.children.filter(child => display(child) !== 'none');
  // Inline runs only need anonymous wrappers next to block siblings
  const wrapInline = boxType.kind === 'block' && visible.some(child => display(child) === 'block');

  let anonymous: Box | null = null;
  for (const child of visible) {
    if (display(child) === 'block') {
      box.children.push(buildBox(child, { kind: 'block', node: child }));
      anonymous = null;
      continue;
    }
    const inline = buildBox(child, { kind: 'inline', node: child });
    if (!wrapInline) {
      box.children.push(inline);
      continue;
    }
    if (!anonymous) {
      anonymous = createBox({ kind: 'anonymous' });
      box.children.push(anonymous);
    }
    anonymous.children.push(inline);
  }
  return box;
}

/**
 * Top-level containing block for a viewport: full width, zero height
 */
export function viewportContainingBlock(viewport: Viewport): Dimensions {
  if (!Number.isFinite(viewport.width) || viewport.width < 0) {
    throw new LayoutInputError(`Viewport width must be a finite, non-negative number, got ${viewport.width}`);
  }
  const dimensions = emptyDimensions();
  dimensions.content.width = viewport.width;
  return dimensions;
}

function edge(node: StyledNode | null, name: string, shorthand: string): Value {
  return node ? lookupValue(node, name, shorthand, ZERO) : ZERO;
}

export class LayoutEngine {
  private _boxCount = 0;

  /**
   * Lay out a styled tree. The containing block is copied, never mutated,
   * and its height is treated as zero.
   */
  layout(root: StyledNode, containingBlock: Dimensions): Box {
    const startTime = performance.now();
    this._boxCount = 0;

    const box = buildLayoutTree(root);
    const block = cloneDimensions(containingBlock);
    block.content.height = 0;
    this._layoutBox(box, block);

    const totalTime = performance.now() - startTime;
    if (totalTime > 20) {
      logger.warn(`Slow layout: ${totalTime.toFixed(2)}ms`, { boxes: this._boxCount });
    } else if (logger.isDebugEnabled()) {
      logger.debug('Layout complete', {
        boxes: this._boxCount,
        width: block.content.width,
        height: marginBox(box.dimensions).height,
      });
    }
    return box;
  }

  private _layoutBox(box: Box, containingBlock: Dimensions): void {
    this._boxCount++;
    switch (box.boxType.kind) {
      case 'block':
      case 'anonymous':
        this._layoutBlock(box, containingBlock);
        break;
      case 'inline':
        this._layoutInline(box, box.boxType.node, containingBlock);
        break;
    }

    if (logger.isTraceEnabled()) {
      const node = boxNode(box);
      logger.trace(`Laid out ${box.boxType.kind} box`, {
        tagName: node?.node.kind === 'element' ? node.node.tagName : undefined,
        content: box.dimensions.content,
      });
    }
  }

  private _layoutBlock(box: Box, containingBlock: Dimensions): void {
    // Width depends on the parent, height on the children
    this._calculateBlockWidth(box, containingBlock);
    this._calculateBlockPosition(box, containingBlock);
    this._layoutChildren(box);
    this._calculateBlockHeight(box);
  }

  /**
   * Horizontal box model: width, horizontal margins, borders and padding
   * must add up to the containing block's width.
   */
  private _calculateBlockWidth(box: Box, containingBlock: Dimensions): void {
    const node = boxNode(box);
    const width = node?.specifiedValues.get('width');
    const widthAuto = width?.kind !== 'length';

    const marginLeftValue = edge(node, 'margin-left', 'margin');
    const marginRightValue = edge(node, 'margin-right', 'margin');
    let marginLeftAuto = isKeyword(marginLeftValue, 'auto');
    let marginRightAuto = isKeyword(marginRightValue, 'auto');

    let contentWidth = width ? toPx(width) : 0;
    let marginLeft = toPx(marginLeftValue);
    let marginRight = toPx(marginRightValue);
    const borderLeft = toPx(edge(node, 'border-left-width', 'border-width'));
    const borderRight = toPx(edge(node, 'border-right-width', 'border-width'));
    const paddingLeft = toPx(edge(node, 'padding-left', 'padding'));
    const paddingRight = toPx(edge(node, 'padding-right', 'padding'));

    const total = marginLeft + marginRight + borderLeft + borderRight + paddingLeft + paddingRight + contentWidth;

    // Too wide: auto margins collapse to zero
    if (!widthAuto && total > containingBlock.content.width) {
      marginLeftAuto = false;
      marginRightAuto = false;
    }

    const underflow = containingBlock.content.width - total;

    if (widthAuto) {
      if (underflow >= 0) {
        contentWidth = underflow;
      } else {
        // Width cannot go negative; the right margin absorbs the overflow
        contentWidth = 0;
        marginRight += underflow;
      }
    } else if (marginLeftAuto && marginRightAuto) {
      marginLeft = underflow / 2;
      marginRight = underflow / 2;
    } else if (marginLeftAuto) {
      marginLeft = underflow;
    } else if (marginRightAuto) {
      marginRight = underflow;
    } else {
      // Over-constrained
      marginRight += underflow;
    }

    const d = box.dimensions;
    d.content.width = contentWidth;
    d.margin.left = marginLeft;
    d.margin.right = marginRight;
    d.border.left = borderLeft;
    d.border.right = borderRight;
    d.padding.left = paddingLeft;
    d.padding.right = paddingRight;
  }

  /**
   * Place the box below everything already laid out in the containing block
   */
  private _calculateBlockPosition(box: Box, containingBlock: Dimensions): void {
    const node = boxNode(box);
    const d = box.dimensions;

    d.margin.top = toPx(edge(node, 'margin-top', 'margin'));
    d.margin.bottom = toPx(edge(node, 'margin-bottom', 'margin'));
    d.border.top = toPx(edge(node, 'border-top-width', 'border-width'));
    d.border.bottom = toPx(edge(node, 'border-bottom-width', 'border-width'));
    d.padding.top = toPx(edge(node, 'padding-top', 'padding'));
    d.padding.bottom = toPx(edge(node, 'padding-bottom', 'padding'));

    d.content.x = containingBlock.content.x + d.margin.left + d.border.left + d.padding.left;
    d.content.y = containingBlock.content.y + containingBlock.content.height +
      d.margin.top + d.border.top + d.padding.top;
  }

  /**
   * Stack children vertically; the content height is the running cursor
   */
  private _layoutChildren(box: Box): void {
    const d = box.dimensions;
    for (const child of box.children) {
      this._layoutBox(child, d);
      d.content.height += marginBox(child.dimensions).height;
    }
  }

  private _calculateBlockHeight(box: Box): void {
    const height = boxNode(box)?.specifiedValues.get('height');
    if (height?.kind === 'length') {
      box.dimensions.content.height = height.value;
    }
  }

  /**
   * Simplified inline model: no edges, full width, children stacked.
   * Text is one line tall.
   */
  private _layoutInline(box: Box, node: StyledNode, containingBlock: Dimensions): void {
    const d = box.dimensions;
    d.content.x = containingBlock.content.x;
    d.content.y = containingBlock.content.y + containingBlock.content.height;
    d.content.width = containingBlock.content.width;

    if (node.node.kind === 'text') {
      const lineHeight = computedValue(node, 'line-height');
      d.content.height = lineHeight.kind === 'length' ? lineHeight.value : 0;
      return;
    }
    this._layoutChildren(box);
  }
}

/**
 * Lay out a styled tree in a containing block. Pure: the same input yields
 * the same dimensions and the containing block is left untouched.
 */
export function layoutTree(root: StyledNode, containingBlock: Dimensions): Box {
  return new LayoutEngine().layout(root, containingBlock);
}

/**
 * Deepest box whose border box contains the point. Later siblings are on top.
 */
export function hitTest(root: Box, x: number, y: number): Box | null {
  for (let i = root.children.length - 1; i >= 0; i--) {
    const hit = hitTest(root.children[i], x, y);
    if (hit) {
      return hit;
    }
  }
  return pointInRect(x, y, borderBox(root.dimensions)) ? root : null;
}
