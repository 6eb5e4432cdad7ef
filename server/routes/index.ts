import { Router } from "express"
import { createSyncRouter, type SyncRouteDeps } from "./sync.routes"

export function createApiRouter(deps: SyncRouteDeps) {
    const router = Router();

    router.use("/sync", createSyncRouter(deps))

    return router
}
