import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type TempCatalog = {
  root: string;
  // Scratch space beside the catalog, e.g. for the cache file.
  workDir: string;
  cachePath: string;
  addEnvironment: (id: string, spec?: EnvironmentSpec) => Promise<string>;
  writeFile: (relPath: string, contents: string) => Promise<void>;
  rm: (relPath: string) => Promise<void>;
  cleanup: () => Promise<void>;
};

export type EnvironmentSpec = {
  // Raw composition text; wins over `services`.
  compose?: string;
  composeFile?: string;
  services?: Record<string, { image?: string; ports?: string[] }>;
  files?: Record<string, string>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createTempCatalog(): Promise<TempCatalog> {
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "vulhub-catalog-"));
  const root = path.join(workDir, "catalog");
  await fs.mkdir(root, { recursive: true });

  const writeFile = async (relPath: string, contents: string): Promise<void> => {
    const absolutePath = path.join(root, relPath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, contents, "utf8");
  };

  const addEnvironment = async (id: string, spec: EnvironmentSpec = {}): Promise<string> => {
    const composeFile = spec.composeFile ?? "docker-compose.yml";
    const compose = spec.compose ?? renderCompose(spec.services ?? { web: { image: "example/web:1.0" } });
    await writeFile(path.join(id, composeFile), compose);
    for (const [relPath, contents] of Object.entries(spec.files ?? {})) {
      await writeFile(path.join(id, relPath), contents);
    }
    return path.join(root, id);
  };

  return {
    root,
    workDir,
    cachePath: path.join(workDir, "cache", "catalog-cache.json"),
    addEnvironment,
    writeFile,
    rm: async (relPath) => {
      await fs.rm(path.join(root, relPath), { recursive: true, force: true });
    },
    cleanup: async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    },
  };
}

export function renderCompose(services: Record<string, { image?: string; ports?: string[] }>): string {
  const lines = ["services:"];
  for (const [name, service] of Object.entries(services)) {
    lines.push(`  ${name}:`);
    if (service.image) lines.push(`    image: ${service.image}`);
    if (service.ports && service.ports.length > 0) {
      lines.push("    ports:");
      for (const port of service.ports) lines.push(`      - "${port}"`);
    }
  }
  return `${lines.join("\n")}\n`;
}
