import type { Express, Request, Response } from "express"
import type { ApplicationConfig } from "../application/config/applicationConfig.js"
import { SERVER_NAME, SERVER_VERSION } from "../application/usecases/system/Health.js"

export function registerHealthEndpoint(app: Express, config: Pick<ApplicationConfig, "readOnly">) {
  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true, name: SERVER_NAME, version: SERVER_VERSION, readOnly: config.readOnly })
  })
}
