import { defineConfig } from "vitest/config";
import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

function getPackageAliases(): Record<string, string> {
  const packagesDir = path.resolve(rootDir, "packages");
  const packages = fs.readdirSync(packagesDir, { withFileTypes: true })
    .filter(dirent => dirent.isDirectory())
    .map(dirent => dirent.name);

  const mainAliases: Record<string, string> = {};
  const subpathAliases: Record<string, string> = {};

  for (const pkg of packages) {
    // Main export: @xpath-edit/<name> -> packages/<name>/src/index.ts
    mainAliases[`@xpath-edit/${pkg}`] = path.resolve(packagesDir, pkg, "src/index.ts");

    const testingIndexPath = path.resolve(packagesDir, pkg, "src/testing/index.ts");
    if (fs.existsSync(testingIndexPath)) {
      subpathAliases[`@xpath-edit/${pkg}/testing`] = testingIndexPath;
    }
  }

  // Subpath aliases must come first for correct resolution
  return { ...subpathAliases, ...mainAliases };
}

export default defineConfig({
  resolve: {
    // Resolve workspace packages to source for tests (no build required)
    alias: getPackageAliases()
  },
  test: {
    environment: "node",
    include: [
      "src/**/*.test.ts",      // Collocated unit tests
      "tests/**/*.test.ts",    // CLI tests
      "packages/**/*.test.ts"  // Package tests
    ]
  }
});
