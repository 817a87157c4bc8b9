import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { describeError } from '../lib/errors.js';

const filterSchema = z.object({
  url: z.string().url(),
  brand: z.string().min(1),
  minYear: z.number().int().min(1900),
  maxMileage: z.number().int().positive(),
  priority: z.boolean().default(false),
  // Relaxed filters keep cards outside the year/mileage bounds; the URL already narrows the search.
  relaxed: z.boolean().default(false),
});

const filtersFileSchema = z
  .record(z.string().regex(/^[a-z0-9_-]+$/i, 'Filter names may only use letters, digits, "-" and "_"'), filterSchema)
  .refine((filters) => Object.keys(filters).length > 0, 'At least one filter must be configured');

export interface FilterDefinition {
  readonly name: string;
  readonly url: string;
  readonly brand: string;
  readonly minYear: number;
  readonly maxMileage: number;
  readonly priority: boolean;
  readonly relaxed: boolean;
}

export type FilterSet = ReadonlyMap<string, FilterDefinition>;

export function parseFilters(raw: unknown): FilterSet {
  const result = filtersFileSchema.safeParse(raw);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Filter configuration is invalid:\n${messages}`);
  }

  const filters = new Map<string, FilterDefinition>();
  for (const [name, definition] of Object.entries(result.data)) {
    filters.set(name, Object.freeze({ name, ...definition }));
  }
  return filters;
}

export function loadFilters(path: string): FilterSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new Error(`Cannot read filter configuration at ${path}: ${describeError(err)}`);
  }
  return parseFilters(raw);
}

/**
 * Priority filters first, then the rest. Each group keeps configuration order.
 */
export function orderFilters(filters: FilterSet): FilterDefinition[] {
  const all = [...filters.values()];
  return [...all.filter((f) => f.priority), ...all.filter((f) => !f.priority)];
}
