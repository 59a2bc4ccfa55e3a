/**
 * Tool Catalog Loader
 *
 * Reads tool descriptors (name, description, inputSchema) from JSON so an
 * index can be built without code. Handlers are never loaded from files.
 *
 * Accepted shapes:
 *   [{ "name": "...", "description": "..." }, ...]
 *   { "tools": [{ "name": "...", "description": "...", "inputSchema": {...} }] }
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { CatalogLoadError, InvalidCatalogError } from '../shared/errors.js';
import type { Tool } from '../shared/types.js';
import { formatIssues } from '../utils/validation.js';

const toolEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  inputSchema: z.record(z.string(), z.unknown()).default({}),
});

// A bare array is shorthand for { tools: [...] }
const catalogSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { tools: value } : value),
  z.object({ tools: z.array(toolEntrySchema) }),
);

/**
 * Validate an already-parsed catalog value.
 */
export function parseToolCatalog(raw: unknown): Tool[] {
  const result = catalogSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidCatalogError(formatIssues(result.error));
  }
  return result.data.tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
}

export function loadToolCatalog(path: string): Tool[] {
  if (!existsSync(path)) {
    throw new CatalogLoadError(path, 'file not found');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new CatalogLoadError(
      path,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      { cause: error },
    );
  }

  try {
    return parseToolCatalog(raw);
  } catch (error) {
    if (error instanceof InvalidCatalogError) {
      throw new CatalogLoadError(path, `invalid catalog\n${error.issues}`, { cause: error });
    }
    throw error;
  }
}
