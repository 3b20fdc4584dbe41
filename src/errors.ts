// Error types and formatting for the parsers and layout engine

/**
 * A problem the HTML or CSS parser recovered from.
 * Parsing never aborts; these records describe what was skipped or repaired.
 */
export interface ParseError {
  message: string;
  line: number;
  column: number;
}

/**
 * Thrown for caller mistakes the layout engine cannot recover from,
 * such as a viewport with a negative or non-finite width.
 */
export class LayoutInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutInputError';
  }
}

/**
 * Thrown when a configuration value does not fit its schema.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public path?: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Narrow a caught value to an Error, wrapping anything else
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function formatParseError(error: ParseError, filePath?: string): string {
  const parts: string[] = [];

  if (filePath) {
    parts.push(filePath);
  }
  parts.push(String(error.line), String(error.column));

  return `${parts.join(':')}: ${error.message}`;
}

export const PARSE_MESSAGES = {
  unclosedElement: (tag: string) =>
    `Element <${tag}> is not closed; closed implicitly at end of input`,

  mismatchedClosingTag: (open: string, close: string) =>
    `Closing tag </${close}> does not match <${open}>; treated as </${open}>`,

  strayClosingTag: (tag: string) =>
    `Closing tag </${tag}> has no open element; skipped`,

  unquotedAttribute: (name: string) =>
    `Attribute "${name}" has an unquoted value`,

  unterminatedAttribute: (name: string) =>
    `Attribute "${name}" value is not terminated`,

  unterminatedComment: () =>
    `Comment is not terminated`,

  multipleRoots: (count: number) =>
    `Document has ${count} top-level nodes; wrapped in an implicit <html> element`,

  unsupportedSelector: (text: string) =>
    `Unsupported selector "${text}"; skipped`,

  ruleWithoutSelectors: () =>
    `Rule has no usable selectors; skipped`,

  missingBlock: () =>
    `Expected "{" after selector list; rest of input skipped`,

  atRuleSkipped: (name: string) =>
    `At-rule "@${name}" is not supported; skipped`,

  invalidDeclaration: (property: string) =>
    property
      ? `Declaration "${property}" has an unsupported value; skipped`
      : `Malformed declaration; skipped`,

  unterminatedBlock: () =>
    `Declaration block is not closed`,

  unterminatedCssComment: () =>
    `Comment is not terminated`,
};
