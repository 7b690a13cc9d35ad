import { z } from 'zod';

/**
 * Bulk import source: arbitrary string keys → numeric or numeric-string
 * values. Values stay `unknown` here; per-entry coercion happens during the
 * import so that one bad value does not reject the whole document.
 */
export const ImportSourceSchema = z.record(z.string(), z.unknown());

export type ImportSource = z.infer<typeof ImportSourceSchema>;

export const MALFORMED_SOURCE_MESSAGE =
  'Import data must be a JSON object mapping material names to quantities in kg.';

export type ParseImportSourceResult =
  | { ok: true; source: ImportSource }
  | { ok: false; message: string };

/** Decode JSON text into an import source. */
export function parseImportSource(text: string): ParseImportSourceResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, message: `Import data is not valid JSON: ${detail}` };
  }

  const parsed = ImportSourceSchema.safeParse(decoded);
  if (!parsed.success) {
    return { ok: false, message: MALFORMED_SOURCE_MESSAGE };
  }
  return { ok: true, source: parsed.data };
}
