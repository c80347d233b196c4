import { z } from "zod";

export const deliveryRecordSchema = z.object({
  url: z.string(),
  messageId: z.string(),
  renderedText: z.string(),
});

/**
 * Persisted proof that an entry was published. Created once, never updated.
 */
export type DeliveryRecord = Readonly<z.infer<typeof deliveryRecordSchema>>;
