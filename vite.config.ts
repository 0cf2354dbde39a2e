import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { apiDevPlugin } from "./vite.apiDevPlugin";
import { loadConfig } from "./api/utils/config";

export default defineConfig(() => {
  const { host, port, openBrowser } = loadConfig(process.env);
  return {
    plugins: [react(), apiDevPlugin()],
    server: {
      host,
      port,
      strictPort: true,
      open: openBrowser
    }
  };
});
