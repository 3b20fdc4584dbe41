// Trellis library entry point
// Import this for library usage: import { renderPage } from './mod.ts'

// Document tree and HTML parser
export * from './src/dom.ts';
export * from './src/html-parser.ts';

// Stylesheet model and CSS parser
export * from './src/stylesheet.ts';
export * from './src/css-parser.ts';

// Style resolution
export * from './src/style.ts';

// Box model geometry and layout engine
export * from './src/geometry.ts';
export * from './src/layout.ts';

// Pipeline and output
export * from './src/page.ts';
export {
  formatDom,
  formatStyledTree,
  formatLayoutTree,
  serializeLayoutTree,
  layoutTreeToJson,
  type SerializedBox,
} from './src/serialization.ts';

// Errors
export * from './src/errors.ts';
export { findElement, collectElements, countNodes, type ElementPredicate } from './src/utils/tree-traversal.ts';

// Export logging system
export * from './src/logging.ts';

// Configuration
export * from './src/config/mod.ts';
