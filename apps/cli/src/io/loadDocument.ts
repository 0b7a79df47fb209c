import fs from 'node:fs';
import { DocumentReadError } from '../errors.js';
import type { JsonValue } from '../types/json.js';

/** Reads and parses a JSON document; the core only ever sees the parsed value. */
export function loadDocument(filePath: string): JsonValue {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new DocumentReadError(filePath, err);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new DocumentReadError(filePath, err);
  }
}
