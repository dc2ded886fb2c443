import { defineConfig } from "vite";
import dts from "vite-plugin-dts";

export default defineConfig({
  build: {
    lib: {
      entry: "src/index.ts",
      name: "termdb-nav",
      fileName: "termdb-nav",
      formats: ["es", "cjs"],
    },
  },
  plugins: [dts({ rollupTypes: true, include: ["src"] })],
});
