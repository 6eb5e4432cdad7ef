import express, { type Request, type Response, type NextFunction } from "express";
import { createApiRouter } from "./routes";
import type { SyncRouteDeps } from "./routes/sync.routes";

export function createApp(deps: SyncRouteDeps) {
  const app = express();

  app.set('trust proxy', 1);
  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        console.log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  app.use("/api", createApiRouter(deps));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[SERVER] Unhandled error:", err);
    res.status(500).json({ message: "Internal Server Error" });
  });

  return app;
}
