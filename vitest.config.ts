import { defineConfig } from "vitest/config";
import fs from "fs";
import path from "path";

// Same bare-directory aliases as vite.config.ts ("type_primitives", "utils/...")
const src_aliases = Object.fromEntries(
  fs
    .readdirSync(path.resolve(__dirname, "src"), { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => [dirent.name, path.resolve(__dirname, `./src/${dirent.name}`)]),
);

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    benchmark: {
      include: ["src/**/__tests__/**/*.bench.ts"],
    },
    alias: src_aliases,
  },
});
