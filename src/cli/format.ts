import type { EnvironmentDescriptor } from "../catalog/types.js";
import type { RunningContainer } from "../engine/ports.js";
import type { OperationFailure } from "../engine/results.js";
import type { CatalogStats } from "../engine/stats.js";

// =============================================================================
// TABLES
// =============================================================================

export function formatEnvironmentTable(environments: readonly EnvironmentDescriptor[]): string[] {
  const rows = environments.map((env) => [
    env.id,
    env.status,
    env.has_images ? "yes" : "no",
    env.has_exploit ? "yes" : "no",
    formatServices(env.services),
  ]);
  return renderTable(["ID", "STATUS", "IMAGES", "EXPLOIT", "PORTS"], rows);
}

export function formatContainerTable(containers: readonly RunningContainer[]): string[] {
  const rows = containers.map((c) => [c.id, c.name, c.image, c.status, c.ports]);
  return renderTable(["ID", "NAME", "IMAGE", "STATUS", "PORTS"], rows);
}

export function formatStats(stats: CatalogStats): string[] {
  const lines = [
    `Total:        ${stats.total}`,
    `Running:      ${stats.running}`,
    `Stopped:      ${stats.stopped}`,
    `Unknown:      ${stats.unknown}`,
    `With exploit: ${stats.with_exploit}`,
    `With images:  ${stats.with_images}`,
    "Categories:",
  ];
  for (const [category, count] of Object.entries(stats.categories)) {
    lines.push(`  ${category}: ${count}`);
  }
  return lines;
}

export function formatServices(services: Record<string, number>): string {
  return Object.entries(services)
    .map(([name, port]) => `${name}:${port}`)
    .join(", ");
}

// =============================================================================
// FAILURES
// =============================================================================

export function formatFailure(id: string, failure: OperationFailure): string[] {
  switch (failure.kind) {
    case "busy":
      return [`${id} is busy: ${failure.message}`];
    case "not_found":
      return [`${id} not found in the catalog.`];
    case "port_conflict":
      return [
        `Port conflict starting ${id}: ${failure.message}`,
        `  Ports: ${failure.ports.join(", ") || "(unknown)"}`,
        `  Held by: ${failure.conflicting.join(", ") || "(unknown)"}`,
      ];
    case "runtime_unavailable":
      return [`Container runtime unavailable: ${failure.message}`];
    case "failed":
      return [`${id} failed: ${failure.message}`];
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderTable(header: string[], rows: string[][]): string[] {
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join("  ")
      .trimEnd();

  return [render(header), ...rows.map(render)];
}
