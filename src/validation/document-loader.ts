/**
 * Document Loader
 *
 * Produces JSON values from strings, JSON Lines text and files.
 * Decoding failures raise JsonSyntaxError, unreadable files DocumentReadError.
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import { fileURLToPath } from 'url';
import { DocumentReadError, JsonSyntaxError } from './errors.js';
import type { JsonValue } from './types.js';

export type DocumentPath = string | URL;

const BOM = '\uFEFF';

/**
 * Parse a JSON document from text
 */
export function parseJsonDocument(text: string, source: string = 'string input'): JsonValue {
  try {
    const value: JsonValue = JSON.parse(stripBom(text));
    return value;
  } catch (error) {
    throw new JsonSyntaxError(source, describe(error));
  }
}

/**
 * Parse JSON Lines text (one value per non-blank line) into an array
 */
export function parseJsonLines(text: string, source: string = 'string input'): JsonValue[] {
  const values: JsonValue[] = [];
  const lines = stripBom(text).split('\n');

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    values.push(parseJsonDocument(trimmed, `${source} line ${index + 1}`));
  });

  return values;
}

/**
 * Read and parse a JSON file
 */
export function readJsonDocument(filePath: DocumentPath): JsonValue {
  const displayPath = toDisplayPath(filePath);
  return parseJsonDocument(readText(filePath), displayPath);
}

/**
 * Read and parse a JSON file without blocking
 */
export async function readJsonDocumentAsync(filePath: DocumentPath): Promise<JsonValue> {
  const displayPath = toDisplayPath(filePath);
  let text: string;
  try {
    text = await fsp.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DocumentReadError(displayPath, describe(error));
  }
  return parseJsonDocument(text, displayPath);
}

/**
 * Read a UTF-8 text file, mapping failures to DocumentReadError
 */
export function readText(filePath: DocumentPath): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DocumentReadError(toDisplayPath(filePath), describe(error));
  }
}

export function toDisplayPath(filePath: DocumentPath): string {
  return typeof filePath === 'string' ? filePath : fileURLToPath(filePath);
}

function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
