/**
 * Environment variable access.
 * Reads `process.env` by default; tests swap in a plain record with Env.use().
 *
 * Use Env.get() instead of process.env throughout the codebase.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class Env {
  private static source: EnvSource = process.env;

  /**
   * Read from `source` instead of process.env. Returns the previous source.
   */
  static use(source: EnvSource): EnvSource {
    const previous = this.source;
    this.source = source;
    return previous;
  }

  static reset(): void {
    this.source = process.env;
  }

  /**
   * Get env var value. Returns undefined if unset.
   */
  static get(name: string): string | undefined {
    return this.source[name];
  }

  static has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Names of all set env vars with the given prefix
   */
  static keys(prefix = ''): string[] {
    return Object.keys(this.source)
      .filter(name => name.startsWith(prefix) && this.source[name] !== undefined)
      .sort();
  }
}
