/**
 * @file Vitest configuration
 *
 * Globals are enabled so specs use describe/it/expect/vi without imports.
 * Unit specs sit beside the sources; public-API specs live under spec/.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts"],
  },
});
