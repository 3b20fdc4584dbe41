// CLI argument parser driven by schema.json

import { ConfigError } from '../errors.ts';
import { CONFIG_SCHEMA, parseConfigValue } from './config.ts';
import type { ConfigProperty } from './config.ts';

export interface ParsedCliFlags {
  flags: Record<string, unknown>;
  remaining: string[];
}

/**
 * Parse CLI arguments based on schema flag definitions.
 * Unknown flags and positional arguments are returned in `remaining`.
 * @param args Command line arguments (typically process.argv.slice(2))
 */
export function parseCliFlags(args: readonly string[]): ParsedCliFlags {
  const flags: Record<string, unknown> = {};
  const remaining: string[] = [];

  // flag -> { path, prop }
  const flagMap = new Map<string, { path: string; prop: ConfigProperty }>();
  for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
    if (prop.flag) {
      flagMap.set(prop.flag, { path, prop });
    }
  }

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    // --flag=value syntax
    const eqIndex = arg.indexOf('=');
    let flagName = arg;
    let flagValue: string | undefined;
    if (eqIndex > 0 && arg.startsWith('--')) {
      flagName = arg.substring(0, eqIndex);
      flagValue = arg.substring(eqIndex + 1);
    }

    const entry = flagMap.get(flagName);
    if (!entry) {
      remaining.push(arg);
      i++;
      continue;
    }

    const { path, prop } = entry;
    if (prop.type === 'boolean') {
      // Presence means true, or false if inverted
      flags[path] = !prop.flagInverted;
    } else {
      if (flagValue === undefined) {
        if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
          flagValue = args[i + 1];
          i++;
        } else {
          const enumHint = prop.enum ? ` [${prop.enum.join('|')}]` : '';
          throw new ConfigError(`${flagName} requires a value${enumHint}`, path);
        }
      }
      flags[path] = parseConfigValue(path, prop, flagValue);
    }
    i++;
  }

  return { flags, remaining };
}

function describe(prop: ConfigProperty): string {
  const desc = prop.description ?? '';
  const typeInfo = prop.enum ? ` [${prop.enum.join('|')}]` : '';
  const defaultStr = prop.default !== undefined && prop.type !== 'boolean' ? ` (default: ${String(prop.default)})` : '';
  return `${desc}${typeInfo}${defaultStr}`;
}

/**
 * Compact help for CLI flags (for --help)
 */
export function generateFlagHelp(): string {
  const lines: string[] = ['Options:'];

  const flagEntries: Array<{ flag: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(CONFIG_SCHEMA.properties)) {
    if (prop.flag) {
      flagEntries.push({ flag: prop.flag, prop });
    }
  }
  flagEntries.sort((a, b) => a.flag.localeCompare(b.flag));

  for (const { flag, prop } of flagEntries) {
    const flagStr = prop.type === 'boolean' ? flag : `${flag} <value>`;
    const envNote = prop.env ? ` (env: ${prop.env})` : '';
    lines.push(`  ${flagStr.padEnd(24)} ${describe(prop)}${envNote}`);
  }

  return lines.join('\n');
}

/**
 * Environment variable reference
 */
export function generateEnvVarHelp(): string {
  const lines: string[] = ['Environment Variables:'];

  const envEntries: Array<{ env: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(CONFIG_SCHEMA.properties)) {
    if (prop.env) {
      envEntries.push({ env: prop.env, prop });
    }
  }
  envEntries.sort((a, b) => a.env.localeCompare(b.env));

  for (const { env, prop } of envEntries) {
    const invertedNote = prop.envInverted ? ' [set to true to disable]' : '';
    lines.push(`  ${env}`);
    lines.push(`    ${describe(prop)}${invertedNote}`);
  }

  return lines.join('\n');
}
