/**
 * Product Idea Schema
 */

import { z } from "zod";

export const ProductIdeaSchema = z.object({
  text: z.string().trim().min(1, "Product idea must not be empty"),
  /** ISO timestamp */
  submittedAt: z.string().datetime().optional(),
  requesterId: z.string().min(1).optional(),
});

export type ProductIdea = Readonly<z.infer<typeof ProductIdeaSchema>>;

/**
 * Build an idea value from raw text
 */
export function createProductIdea(text: string, metadata: { requesterId?: string } = {}): ProductIdea {
  return Object.freeze(
    ProductIdeaSchema.parse({
      text,
      submittedAt: new Date().toISOString(),
      requesterId: metadata.requesterId,
    })
  );
}
