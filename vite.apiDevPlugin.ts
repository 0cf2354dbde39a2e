import type { PluginOption } from "vite";

const routes: Record<string, string> = {
  "/upload": "/api/upload.ts",
  "/summary": "/api/summary.ts",
  "/shots": "/api/shots.ts",
  "/target-data": "/api/target-data.ts"
};

/** Serves the handlers under api/ from the dev server, one module per route. */
export const apiDevPlugin = (): PluginOption => ({
  name: "score-api-dev-endpoints",
  configureServer(server) {
    server.middlewares.use("/api", async (req, res, next) => {
      const path = (req.url ?? "").split("?")[0];
      const modulePath = routes[path];
      if (!modulePath) {
        return next();
      }
      try {
        const module = await server.ssrLoadModule(modulePath);
        if (typeof module.default === "function") {
          await module.default(req, res);
          return;
        }
      } catch (error) {
        console.error("[api] dev handler error", error);
        res.statusCode = 500;
        res.setHeader("Content-Type", "application/json");
        res.end(
          JSON.stringify({
            ok: false,
            error: "Dev handler error",
            requestId: "dev"
          })
        );
        return;
      }
      next();
    });
  }
});
