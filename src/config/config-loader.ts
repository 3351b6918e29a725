/**
 * cmdtree - Configuration Loader
 *
 * Loads the optional JSON config file a script declares and overlays its
 * entries onto the options parsed from the command line.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigEntry, OptionValue, ParsedOptions } from '../types/spec';
import { ConfigLoadError } from '../utils/error-handler';

export class ConfigLoader {
  /**
   * Load key/value entries from a config file, in file order.
   * A missing file yields no entries; an unreadable or malformed one throws.
   */
  static load(configPath: string): ConfigEntry[] {
    const filePath = this.expandPath(configPath);

    if (!this.isRegularFile(filePath)) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigLoadError(filePath, error);
    }

    if (!this.isConfigObject(parsed)) {
      throw new ConfigLoadError(filePath, new Error('expected a JSON object of option values'));
    }

    return Object.entries(parsed).map(
      ([key, value]): ConfigEntry => [key, this.expandEnvironmentVariables(value)]
    );
  }

  /**
   * Keyed replace: each entry overwrites the option with the same key or adds
   * it. Later entries win over earlier ones and over parsed values.
   */
  static overlay(options: ParsedOptions, entries: readonly ConfigEntry[]): ParsedOptions {
    const merged = new Map(options);
    for (const [key, value] of entries) {
      merged.set(key, value);
    }
    return merged;
  }

  /**
   * Expand ~ and environment variables in paths
   */
  static expandPath(inputPath: string): string {
    if (!inputPath) return inputPath;

    const expandedPath = this.expandEnvironmentVariable(inputPath.replace(/^~(?=$|[\\/])/, os.homedir()));
    return path.resolve(expandedPath);
  }

  private static isRegularFile(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }

  private static isConfigObject(value: unknown): value is { [key: string]: OptionValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * Recursively expand environment variables in string values
   */
  private static expandEnvironmentVariables(value: OptionValue): OptionValue {
    if (typeof value === 'string') {
      return this.expandEnvironmentVariable(value);
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.expandEnvironmentVariables(item));
    }

    if (value && typeof value === 'object') {
      const result: { [key: string]: OptionValue } = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.expandEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  /**
   * Expand ${VAR} and $VAR patterns; unset variables expand to ''
   */
  private static expandEnvironmentVariable(value: string): string {
    return value
      .replace(/\$\{([^}]+)\}/g, (_, varName: string) => process.env[varName] || '')
      .replace(/\$([A-Z_][A-Z0-9_]*)/g, (_, varName: string) => process.env[varName] || '');
  }
}
