import { NextFunction, Request, Response, Router } from "express";
import { GenerationGateway, GenerationRequest, GenerationResponse } from "../../core/inference";
import { parseBody } from "../middleware/validation";
import { GenerateRequestSchema } from "./schemas";

/**
 * POST /generate and POST /ask. Both run the same handler, so identical
 * bodies give identical responses.
 */
export function generateRoutes(gateway: GenerationGateway) {
  const r = Router();

  const handler = async (req: Request, res: Response<GenerationResponse>, next: NextFunction) => {
    try {
      const { model, prompt }: GenerationRequest = parseBody(GenerateRequestSchema, req.body);
      const response = await gateway.respond(model, prompt);
      res.json({ response });
    } catch (error) {
      next(error);
    }
  };

  r.post("/generate", handler);
  r.post("/ask", handler);

  return r;
}
