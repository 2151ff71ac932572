/**
 * Rule Loader
 *
 * Loads rule expressions from a rules file: one rule per line,
 * blank lines and `#` comments dropped.
 * Reloads when the file's modification time changes.
 */

import * as fs from 'fs';
import { readText, toDisplayPath, type DocumentPath } from './document-loader.js';
import { DocumentReadError } from './errors.js';

/**
 * Rule Loader
 *
 * Manages loading of rule expressions from one text file.
 */
export class RuleLoader {
  private rules: string[] | null = null;
  private lastMtime: number = 0;

  constructor(private readonly rulesPath: DocumentPath) {}

  /**
   * Load rules from the file
   */
  load(): string[] {
    this.rules = parseRuleLines(readText(this.rulesPath));
    this.lastMtime = this.currentMtime() ?? 0;
    return [...this.rules];
  }

  /**
   * Get rules (loads if not loaded)
   */
  getRules(): string[] {
    if (!this.rules) {
      return this.load();
    }
    return [...this.rules];
  }

  /**
   * Check if the rules file changed and reload if needed
   */
  reloadIfChanged(): boolean {
    const mtime = this.currentMtime();
    if (mtime === null) {
      return false;
    }

    if (this.rules === null || mtime !== this.lastMtime) {
      this.load();
      return true;
    }
    return false;
  }

  get path(): string {
    return toDisplayPath(this.rulesPath);
  }

  private currentMtime(): number | null {
    try {
      return fs.statSync(this.rulesPath).mtimeMs;
    } catch {
      return null;
    }
  }
}

/**
 * Split rules file content into expressions
 */
export function parseRuleLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Load and concatenate rules from several files, in order
 */
export function loadRules(...paths: DocumentPath[]): string[] {
  if (paths.length === 0) {
    throw new DocumentReadError('(none)', 'no rules file given');
  }
  return paths.flatMap((rulesPath) => new RuleLoader(rulesPath).load());
}
