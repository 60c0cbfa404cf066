import { defineConfig } from "vitest/config";

const workspaceProjects = [
  [ "./packages/types/vitest.config.ts", "./packages/types" ],
  [ "./packages/config/vitest.config.ts", "./packages/config" ],
  [ "./packages/io/vitest.config.ts", "./packages/io" ],
  [ "./packages/engine/vitest.config.ts", "./packages/engine" ],
] as const;

export default defineConfig({
  test: {
    projects: workspaceProjects.map(([ configPath, root ]) => ({
      root,
      extends: configPath,
    })),
  },
});
