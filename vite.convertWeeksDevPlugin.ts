import type { PluginOption } from "vite";

const ROUTE = "/api/convert-weeks";

export const convertWeeksDevPlugin = (): PluginOption => ({
  name: "convert-weeks-dev-endpoint",
  configureServer(server) {
    server.middlewares.use(ROUTE, async (req, res) => {
      // Connect strips the mount path; the handler reads its query from the full URL.
      req.url = req.originalUrl ?? req.url;
      try {
        // Avoid pre-bundling this handler; it's only needed in dev.
        const module = await import("./api/convert-weeks");
        await module.default(req, res);
      } catch (error) {
        console.error("[convert-weeks] dev handler error", error);
        res.statusCode = 500;
        res.setHeader("Content-Type", "application/json");
        res.end(
          JSON.stringify({
            ok: false,
            error: "Dev handler error",
            requestId: "dev"
          })
        );
      }
    });
  }
});
