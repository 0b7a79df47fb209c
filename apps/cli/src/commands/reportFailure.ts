import { ZodError } from 'zod';
import { ConfigError } from '../config.js';
import {
  DocumentReadError,
  MalformedRecordError,
  UnrecognizedDocumentError,
} from '../errors.js';

const EXPECTED = [ConfigError, DocumentReadError, MalformedRecordError, UnrecognizedDocumentError];

// yargs raises usage problems (unknown flags, missing positionals) as YError
const isUsageError = (err: Error): boolean => err.name === 'YError';

/**
 * Last stop for script failures: input and usage problems get their message,
 * anything else (including AlreadyFinalizedError, which is a bug) gets a stack.
 */
export function reportFailure(tag: string, err: unknown): never {
  if (err instanceof ZodError) {
    for (const issue of err.issues) {
      console.error(`[${tag}] Invalid option ${issue.path.join('.')}: ${issue.message}`);
    }
  } else if (err instanceof Error && (isUsageError(err) || EXPECTED.some((cls) => err instanceof cls))) {
    console.error(`[${tag}] ${err.message}`);
  } else if (err instanceof Error) {
    console.error(`[${tag}] Error:`, err.message);
    console.error(`[${tag}] Error stack:`, err.stack ?? 'No stack');
  } else {
    console.error(`[${tag}] Error:`, err);
  }
  process.exit(1);
}
