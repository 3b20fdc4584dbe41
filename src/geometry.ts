// Geometry for the CSS box model: rectangles, edge sizes and box dimensions
// Shared by the layout engine, serialization and the paint collaborator

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Position, Size {}

export interface EdgeSizes {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * Box dimensions in the content-box model.
 * Padding, border and margin are stored as edge sizes around the content rect;
 * the outer rectangles are always derived, never stored.
 */
export interface Dimensions {
  content: Rect;
  padding: EdgeSizes;
  border: EdgeSizes;
  margin: EdgeSizes;
}

export function zeroRect(): Rect {
  return { x: 0, y: 0, width: 0, height: 0 };
}

export function zeroEdges(): EdgeSizes {
  return { left: 0, right: 0, top: 0, bottom: 0 };
}

export function emptyDimensions(): Dimensions {
  return {
    content: zeroRect(),
    padding: zeroEdges(),
    border: zeroEdges(),
    margin: zeroEdges(),
  };
}

/**
 * Grow a rectangle outward by the given edge sizes
 */
export function expandedBy(rect: Rect, edge: EdgeSizes): Rect {
  return {
    x: rect.x - edge.left,
    y: rect.y - edge.top,
    width: rect.width + edge.left + edge.right,
    height: rect.height + edge.top + edge.bottom,
  };
}

export function paddingBox(d: Dimensions): Rect {
  return expandedBy(d.content, d.padding);
}

export function borderBox(d: Dimensions): Rect {
  return expandedBy(paddingBox(d), d.border);
}

export function marginBox(d: Dimensions): Rect {
  return expandedBy(borderBox(d), d.margin);
}

export function cloneDimensions(d: Dimensions): Dimensions {
  return {
    content: { ...d.content },
    padding: { ...d.padding },
    border: { ...d.border },
    margin: { ...d.margin },
  };
}

/**
 * Check if a point is within a rectangle
 */
export function pointInRect(x: number, y: number, rect: Rect): boolean {
  return x >= rect.x && x < rect.x + rect.width &&
         y >= rect.y && y < rect.y + rect.height;
}

