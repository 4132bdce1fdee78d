import { Request, Response, Router } from "express";
import { CatalogRepository } from "../db/repositories/catalog.repo";

interface HealthControllerDeps {
  catalog: Pick<CatalogRepository, "getBackend" | "ping">;
  version: string;
  now?: () => Date;
}

export function buildHealthController(deps: HealthControllerDeps): Router {
  const router = Router();
  const now = deps.now ?? (() => new Date());

  router.get("/", async (_request: Request, response: Response) => {
    const connected = await deps.catalog.ping();
    response.status(connected ? 200 : 500).json({
      status: connected ? "ok" : "error",
      timestamp: now().toISOString(),
      catalog: deps.catalog.getBackend(),
      database: connected ? "connected" : "disconnected",
      version: deps.version,
    });
  });

  return router;
}
