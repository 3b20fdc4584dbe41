#!/usr/bin/env -S npx tsx
/**
 * # Trellis
 *
 * Parses an HTML document and its stylesheets, resolves styles and prints
 * the laid-out box tree.
 *
 * ```bash
 * npm run dump -- page.html extra.css --width 1024
 * npm run dump -- page.html --format json
 * ```
 *
 * For programmatic use, import from `./mod.ts`.
 *
 * @module
 */

import { main } from './src/cli.ts';

await main();
