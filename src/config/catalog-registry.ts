// ---------------------------------------------------------------------------
// Catalog registry loader.
// Reads a YAML file, validates with Zod, and returns typed
// CatalogDefinition[] objects in file order.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import type { CatalogDefinition } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const CatalogSchema = z.object({
  id: z.string().min(1),
  baseUrl: z.string().url(),
  enabled: z.boolean().default(true),
});

export const CatalogRegistrySchema = z.object({
  catalogs: z.array(CatalogSchema).min(1),
});

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed registry document.
 * Throws {@link ConfigurationError} on schema violations or duplicate ids.
 */
export function parseCatalogRegistry(
  document: unknown,
  source = "catalog registry",
): CatalogDefinition[] {
  const result = CatalogRegistrySchema.safeParse(document);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${source}: ${details}`);
  }

  const seen = new Set<string>();
  for (const catalog of result.data.catalogs) {
    if (seen.has(catalog.id)) {
      throw new ConfigurationError(
        `Invalid ${source}: duplicate catalog id "${catalog.id}"`,
      );
    }
    seen.add(catalog.id);
  }

  return result.data.catalogs.map((c) => ({
    id: c.id,
    baseUrl: c.baseUrl,
    enabled: c.enabled,
  }));
}

/**
 * Load the catalog registry from a YAML file of the form
 *
 * ```yaml
 * catalogs:
 *   - id: hawaii
 *     baseUrl: https://libbyapp.com/library/hawaii
 * ```
 */
export function loadCatalogRegistry(filePath: string): CatalogDefinition[] {
  const absolutePath = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `Catalog registry file cannot be read: ${absolutePath}`,
      { cause: err },
    );
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Catalog registry ${absolutePath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  return parseCatalogRegistry(document, `catalog registry ${absolutePath}`);
}
