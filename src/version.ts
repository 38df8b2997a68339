/**
 * Package version - read dynamically from package.json
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export const PACKAGE_NAME = "mcp-switchboard";

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
});

function findPackageJson(): { version: string } {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    try {
      const content = readFileSync(join(dir, "package.json"), "utf-8");
      const pkg = PackageJsonSchema.safeParse(JSON.parse(content));
      if (pkg.success && pkg.data.name === PACKAGE_NAME) return pkg.data;
    } catch {
      // Not found at this level, go up
    }
    dir = dirname(dir);
  }
  return { version: "0.0.0" };
}

export const VERSION: string = findPackageJson().version;
