import { createRequire } from "node:module";
import { z } from "zod";

const packageManifest = z.object({ version: z.string().min(1) });

/**
 * Walk a list of relative `package.json` candidate paths
 * and return the first `.version` string found.
 *
 * @param importMetaUrl  `import.meta.url` of the calling module, used as
 *                       the base for `createRequire`.
 * @param candidates     Relative paths to `package.json` files to try.
 */
export function resolvePackageVersion(importMetaUrl: string, candidates: string[]): string {
  const req = createRequire(importMetaUrl);
  for (const candidate of candidates) {
    let manifest: unknown;
    try {
      manifest = req(candidate);
    } catch {
      continue;
    }
    const parsed = packageManifest.safeParse(manifest);
    if (parsed.success) return parsed.data.version;
  }
  return "unknown";
}
