import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(
  fileURLToPath(new URL(".", import.meta.url)),
  ".."
);

const packageNames = [ "config", "engine", "io", "types" ] as const;

const packageAliases = packageNames.flatMap((name) => {
  const basePath = path.resolve(workspaceRoot, "packages", name, "src");
  return [
    { find: `@runstream/${name}`, replacement: basePath },
    { find: `@runstream/${name}/`, replacement: `${basePath}/` },
  ];
});

export const createPackageVitestConfig = (packageName: string) =>
  defineConfig({
    resolve: {
      alias: packageAliases,
    },
    test: {
      name: packageName,
      globals: true,
      include: [ "test/**/*.test.ts" ],
      environment: "node",
      pool: "threads",
      coverage: {
        reporter: [ "text", "json-summary" ],
        include: [ "src/**/*.ts" ],
        reportsDirectory: path.resolve(workspaceRoot, "coverage", packageName),
        reportOnFailure: true,
      },
    },
  });

export default createPackageVitestConfig;
