import { defineConfig } from "vite";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

// Workspace packages load from their TypeScript sources.
export default defineConfig({
  resolve: {
    alias: [
      { find: /^@tessera\/lib$/, replacement: resolve(packagesRoot, "lib/src/index.ts") },
      { find: /^@tessera\/compiler$/, replacement: resolve(packagesRoot, "compiler/src/index.ts") },
      {
        find: /^@tessera\/language-server$/,
        replacement: resolve(packagesRoot, "language-server/src/index.ts"),
      },
    ],
  },
});
