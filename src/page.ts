// Page pipeline: HTML and CSS text in, laid-out box tree out

import { parseCssDocument } from './css-parser.ts';
import { textContent } from './dom.ts';
import type { ElementNode } from './dom.ts';
import type { ParseError } from './errors.ts';
import { extractStyleText, parseHtmlDocument } from './html-parser.ts';
import { layoutTree, viewportContainingBlock } from './layout.ts';
import type { Box, Viewport } from './layout.ts';
import { getLogger } from './logging.ts';
import { resolveStyles } from './style.ts';
import type { StyledNode } from './style.ts';
import type { Stylesheet } from './stylesheet.ts';
import { getUserAgentStylesheet } from './user-agent.ts';
import { countNodes, findElement } from './utils/tree-traversal.ts';

const logger = getLogger('Page');

/**
 * A caller-supplied stylesheet. Plain strings are named `stylesheet[i]` in diagnostics.
 */
export type StylesheetInput = string | { name: string; css: string };

export interface RenderOptions {
  html: string;
  stylesheets?: readonly StylesheetInput[];
  viewport: Viewport;
  // Prepend the built-in sheet (default true)
  userAgentStylesheet?: boolean;
  // Apply <style> elements of the document (default true)
  documentStyles?: boolean;
}

/**
 * A parse problem and where it came from: `document`, `<style>[i]` or a stylesheet name
 */
export interface PageDiagnostic {
  origin: string;
  error: ParseError;
}

export interface RenderedPage {
  dom: ElementNode;
  title?: string;
  // In cascade order
  stylesheets: Stylesheet[];
  styledTree: StyledNode;
  layout: Box;
  errors: PageDiagnostic[];
}

export function renderPage(options: RenderOptions): RenderedPage {
  // Validate before doing any work
  const containingBlock = viewportContainingBlock(options.viewport);
  const errors: PageDiagnostic[] = [];

  const { root: dom, errors: htmlErrors } = parseHtmlDocument(options.html);
  errors.push(...htmlErrors.map(error => ({ origin: 'document', error })));

  const stylesheets: Stylesheet[] = [];
  const addStylesheet = (origin: string, css: string): void => {
    const result = parseCssDocument(css);
    stylesheets.push(result.stylesheet);
    errors.push(...result.errors.map(error => ({ origin, error })));
  };

  if (options.userAgentStylesheet ?? true) {
    stylesheets.push(getUserAgentStylesheet());
  }
  if (options.documentStyles ?? true) {
    extractStyleText(dom).forEach((css, index) => addStylesheet(`<style>[${index}]`, css));
  }
  (options.stylesheets ?? []).forEach((input, index) => {
    if (typeof input === 'string') {
      addStylesheet(`stylesheet[${index}]`, input);
    } else {
      addStylesheet(input.name, input.css);
    }
  });

  const styledTree = resolveStyles(dom, stylesheets);
  const layout = layoutTree(styledTree, containingBlock);

  const titleElement = findElement(dom, element => element.tagName === 'title');
  const title = titleElement ? textContent(titleElement).trim() : undefined;

  logger.debug('Rendered page', {
    nodes: countNodes(dom),
    stylesheets: stylesheets.length,
    errors: errors.length,
    viewportWidth: options.viewport.width,
  });

  return { dom, title, stylesheets, styledTree, layout, errors };
}
