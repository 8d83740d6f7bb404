/**
 * Module catalog: the standard and extra module sets and the migration
 * manifests, kept as versioned data next to the code.
 */
import { z } from "zod";
import catalogData from "../../data/catalog.json" with { type: "json" };

const ModuleNameSchema = z.string().regex(/^[A-Za-z0-9_]+$/);

export const MigrationManifestSchema = z.object({
  from: z.string(),
  to: z.string(),
  backend: z.string(),
  /** Stored procedure the migration scripts define for copying one table. */
  copyProcedure: z.string().min(1),
  tables: z.array(ModuleNameSchema).min(1),
});

export type MigrationManifest = z.infer<typeof MigrationManifestSchema>;

export const CatalogSchema = z.object({
  version: z.string(),
  modules: z.object({
    standard: z.array(ModuleNameSchema),
    extra: z.array(ModuleNameSchema).default([]),
  }),
  migrations: z.array(MigrationManifestSchema).default([]),
});

export type Catalog = z.infer<typeof CatalogSchema>;

export function parseCatalog(raw: unknown): Catalog {
  return CatalogSchema.parse(raw);
}

export const DEFAULT_CATALOG: Catalog = parseCatalog(catalogData);

/** The manifest whose destination is the catalog's own schema version. */
export function currentManifest(catalog: Catalog): MigrationManifest | null {
  return catalog.migrations.find((m) => m.to === catalog.version) ?? null;
}

/** Standard modules first, then extra ones, without duplicates. */
export function knownModules(catalog: Catalog): string[] {
  return [...new Set([...catalog.modules.standard, ...catalog.modules.extra])];
}
