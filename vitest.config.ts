import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromSrc = (dir: string): string =>
  fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": fromSrc("app"),
      "@config": fromSrc("config"),
      "@domain": fromSrc("domain"),
      "@infrastructure": fromSrc("infrastructure"),
      "@interfaces": fromSrc("interfaces"),
      "@middleware": fromSrc("middleware"),
      "@routes": fromSrc("routes"),
      "@typesLocal": fromSrc("types"),
      "@utils": fromSrc("utils"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
