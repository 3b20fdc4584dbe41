// Command line front end: read an HTML file and stylesheets, print a dump

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { generateEnvVarHelp, generateFlagHelp, parseCliFlags, TrellisConfig } from './config/mod.ts';
import type { OutputFormat } from './config/mod.ts';
import { ConfigError, LayoutInputError, ensureError, formatParseError } from './errors.ts';
import { createLogger, getGlobalLogger, getLogger, setGlobalLogger } from './logging.ts';
import { renderPage } from './page.ts';
import type { RenderedPage } from './page.ts';
import { formatDom, formatLayoutTree, formatStyledTree, layoutTreeToJson } from './serialization.ts';

const logger = getLogger('Cli');

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
  readFile: path => readFile(path, 'utf8'),
};

export function usageText(): string {
  return [
    'trellis - parse HTML and CSS and print the laid-out box tree',
    '',
    'Usage:',
    '  trellis <page.html> [style.css ...] [options]',
    '',
    generateFlagHelp(),
    `  ${'--print-config'.padEnd(24)} Print the resolved configuration and exit`,
    `  ${'--help, -h'.padEnd(24)} Show this help message`,
    '',
    generateEnvVarHelp(),
    '',
    'Configuration file: $XDG_CONFIG_HOME/trellis/config.json',
    'A .env file in the working directory is loaded without overriding the environment.',
  ].join('\n');
}

export function formatOutput(page: RenderedPage, format: OutputFormat): string {
  switch (format) {
    case 'tree':
      return formatLayoutTree(page.layout);
    case 'json':
      return layoutTreeToJson(page.layout);
    case 'dom':
      return formatDom(page.dom);
    case 'styles':
      return formatStyledTree(page.styledTree);
  }
}

/**
 * Run the CLI. Returns the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIO = defaultIO): Promise<number> {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    io.stdout(usageText());
    return 0;
  }

  let config: TrellisConfig;
  let positional: string[];
  try {
    const { flags, remaining } = parseCliFlags(args);
    const printConfig = remaining.includes('--print-config');
    positional = remaining.filter(arg => arg !== '--print-config');

    const unknown = positional.find(arg => arg.startsWith('--'));
    if (unknown) {
      throw new ConfigError(`Unknown option ${unknown}`);
    }

    // Each run reads configuration afresh
    TrellisConfig.reset();
    config = TrellisConfig.init({ cliFlags: flags });
    if (printConfig) {
      io.stdout(config.getConfigText());
      return 0;
    }
  } catch (error) {
    io.stderr(`Error: ${ensureError(error).message}`);
    io.stderr('Use --help for usage information');
    return 1;
  }

  const [htmlPath, ...cssPaths] = positional;
  if (!htmlPath) {
    io.stderr('Error: No HTML file specified');
    io.stderr('Use --help for usage information');
    return 1;
  }

  setGlobalLogger(createLogger({
    logFile: config.logFile,
    level: config.logLevel,
    format: config.logFormat,
  }));

  let html: string;
  const stylesheets: { name: string; css: string }[] = [];
  try {
    html = await io.readFile(htmlPath);
    for (const cssPath of cssPaths) {
      stylesheets.push({ name: cssPath, css: await io.readFile(cssPath) });
    }
  } catch (error) {
    const err = ensureError(error);
    logger.error('Failed to read input', err);
    io.stderr(`Error: ${err.message}`);
    return 1;
  }

  let page: RenderedPage;
  try {
    page = renderPage({
      html,
      stylesheets,
      viewport: { width: config.viewportWidth },
      userAgentStylesheet: config.userAgentStylesheet,
      documentStyles: config.documentStyles,
    });
  } catch (error) {
    if (error instanceof LayoutInputError) {
      io.stderr(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  for (const { origin, error } of page.errors) {
    io.stderr(formatParseError(error, origin === 'document' ? htmlPath : origin));
  }

  logger.info('Rendered', { file: htmlPath, format: config.outputFormat, diagnostics: page.errors.length });
  io.stdout(formatOutput(page, config.outputFormat));
  return 0;
}

/**
 * Process entry point: loads .env, runs, flushes the log and sets the exit code
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  dotenvConfig({ path: resolve(process.cwd(), '.env'), override: false });
  try {
    process.exitCode = await runCli(argv);
  } finally {
    getGlobalLogger().close();
  }
}
