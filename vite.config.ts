/// <reference types="vitest" />
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { convertWeeksDevPlugin } from "./vite.convertWeeksDevPlugin";

const isTest = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);

export default defineConfig(({ mode }) => {
  const baseConfig = {
    test: {
      environment: "jsdom",
      globals: true,
      setupFiles: "./src/tests/setup.ts",
      include: ["src/tests/**/*.test.{ts,tsx}"]
    }
  };

  if (isTest || mode === "test") {
    return {
      ...baseConfig,
      plugins: [react()]
    };
  }

  return {
    ...baseConfig,
    plugins: [react(), convertWeeksDevPlugin()]
  };
});
