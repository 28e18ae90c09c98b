/**
 * Zod validation schemas for API routes
 */

import { z } from "zod";

// Extra fields are tolerated so older clients keep working
export const GenerateRequestSchema = z.object({
  model: z.string().optional(),
  prompt: z.string(),
});
