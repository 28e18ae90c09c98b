import { NextFunction, Request, Response, Router } from "express";
import { ManagedInferenceClient } from "../../core/inference";

export const HEALTH_MESSAGE = "Ollama LLM container is up";

export function statusRoutes(client: ManagedInferenceClient, defaultModel: string) {
  const r = Router();

  // Static on purpose: answers even when the backend is down
  r.get("/", (_req: Request, res: Response) => {
    res.json({ message: HEALTH_MESSAGE });
  });

  r.get("/health", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const up = await client.isAvailable();
      res.json({ status: "ok", backend: up ? "up" : "down", defaultModel });
    } catch (error) {
      next(error);
    }
  });

  r.get("/models", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const installed = await client.listInstalledModels();
      res.json({ models: [...installed].sort() });
    } catch (error) {
      next(error);
    }
  });

  return r;
}
