/*
Purpose: extract the fields the catalog needs from a container-composition file.
Assumptions: only `services.<name>.ports` and `services.<name>.image` matter; every other
key is ignored.
Usage: const parsed = parseComposition(text, composePath).
*/

import yaml from "js-yaml";

import { CompositionParseError } from "../core/errors.js";
import { uniqueInOrder } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ParsedComposition = {
  serviceNames: string[];
  // service -> first published host port
  services: Record<string, number>;
  images: string[];
};

export type CompositionParseResult =
  | { ok: true; composition: ParsedComposition }
  | { ok: false; error: CompositionParseError; images: string[] };

// Priority order when a directory holds more than one.
export const COMPOSE_FILE_NAMES = [
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml",
] as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseComposition(text: string, composePath: string): CompositionParseResult {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: new CompositionParseError(`Invalid YAML in ${composePath}: ${detail}`, composePath, err),
      images: scanImageLines(text),
    };
  }

  if (doc === undefined || doc === null) {
    return { ok: true, composition: { serviceNames: [], services: {}, images: [] } };
  }

  if (!isRecord(doc)) {
    return {
      ok: false,
      error: new CompositionParseError(`Expected a mapping at the top of ${composePath}`, composePath),
      images: [],
    };
  }

  const servicesNode = doc.services;
  if (servicesNode === undefined || servicesNode === null) {
    return { ok: true, composition: { serviceNames: [], services: {}, images: [] } };
  }
  if (!isRecord(servicesNode)) {
    return {
      ok: false,
      error: new CompositionParseError(`"services" must be a mapping in ${composePath}`, composePath),
      images: scanImageLines(text),
    };
  }

  const serviceNames: string[] = [];
  const services: Record<string, number> = {};
  const images: string[] = [];

  for (const [name, service] of Object.entries(servicesNode)) {
    serviceNames.push(name);
    if (!isRecord(service)) continue;

    if (typeof service.image === "string" && service.image.trim()) {
      images.push(service.image.trim());
    }

    const hostPort = firstHostPort(service.ports);
    if (hostPort !== null) {
      services[name] = hostPort;
    }
  }

  return {
    ok: true,
    composition: { serviceNames, services, images: uniqueInOrder(images) },
  };
}

/**
 * Host port of a single `ports` entry: `"8080:80"`, `"127.0.0.1:8080:80/tcp"` or the long
 * form `{ published: 8080 }`. Ranges and container-only entries (`"80"`, `80`) yield null.
 */
export function parseHostPort(entry: unknown): number | null {
  if (typeof entry === "number") {
    return null;
  }

  if (typeof entry === "string") {
    const withoutProtocol = entry.split("/")[0] ?? "";
    const parts = withoutProtocol.split(":");
    if (parts.length < 2) {
      return null;
    }
    return toPort(parts[parts.length - 2]);
  }

  if (isRecord(entry)) {
    return toPort(entry.published);
  }

  return null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function firstHostPort(ports: unknown): number | null {
  if (!Array.isArray(ports)) return null;

  for (const entry of ports) {
    const port = parseHostPort(entry);
    if (port !== null) return port;
  }

  return null;
}

function toPort(value: unknown): number | null {
  const text = typeof value === "number" ? String(value) : typeof value === "string" ? value.trim() : "";
  if (!/^\d+$/.test(text)) return null;

  const port = Number.parseInt(text, 10);
  return port > 0 && port <= 65_535 ? port : null;
}

function scanImageLines(text: string): string[] {
  const images: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*image\s*:\s*["']?([^\s#"']+)/.exec(line);
    if (match?.[1]) images.push(match[1]);
  }
  return uniqueInOrder(images);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
