// Built-in user-agent stylesheet, first in the cascade

import { parseCss } from './css-parser.ts';
import type { Stylesheet } from './stylesheet.ts';

export const USER_AGENT_CSS = `
html, body, div, p, section, article, aside, header, footer, nav, main,
h1, h2, h3, h4, h5, h6, ul, ol, li, dl, dt, dd, blockquote, pre, form,
fieldset, figure, figcaption, address, hr, table {
  display: block;
}

head, style, script, meta, title, link {
  display: none;
}
`;

let userAgentStylesheet: Stylesheet | undefined;

export function getUserAgentStylesheet(): Stylesheet {
  if (!userAgentStylesheet) {
    userAgentStylesheet = parseCss(USER_AGENT_CSS);
  }
  return userAgentStylesheet;
}
