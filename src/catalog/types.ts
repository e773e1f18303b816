import { z } from "zod";

import { compareIds } from "../core/utils.js";

// Bump when the persisted shape changes; older files are treated as a cold start.
export const CACHE_FORMAT_VERSION = 2;

export const EnvironmentStatusSchema = z.enum(["running", "stopped", "unknown"]);
export type EnvironmentStatus = z.infer<typeof EnvironmentStatusSchema>;

export const EnvironmentDescriptorSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  cve: z.string().min(1),
  services: z.record(z.string(), z.number().int().positive()),
  service_names: z.array(z.string()),
  images: z.array(z.string()),
  has_exploit: z.boolean(),
  has_images: z.boolean(),
  status: EnvironmentStatusSchema,
  content_signature: z.string(),
  compose_file: z.string(),
  has_readme: z.boolean(),
  has_readme_zh: z.boolean(),
  has_screenshots: z.boolean(),
  parse_error: z.string().optional(),
  last_checked: z.string().nullable(),
});

export type EnvironmentDescriptor = z.infer<typeof EnvironmentDescriptorSchema>;

export const CatalogSnapshotSchema = z.object({
  format_version: z.literal(CACHE_FORMAT_VERSION),
  catalog_root: z.string(),
  catalog_fingerprint: z.string(),
  generated_at: z.string(),
  environments: z.record(z.string(), EnvironmentDescriptorSchema),
});

export type CatalogSnapshot = z.infer<typeof CatalogSnapshotSchema>;

export type CatalogFingerprint = {
  fingerprint: string;
  environments: number;
};

export function sortedEnvironments(snapshot: CatalogSnapshot): EnvironmentDescriptor[] {
  return Object.values(snapshot.environments).sort((a, b) => compareIds(a.id, b.id));
}
