import { z } from 'zod';

const EditorGetConfiguration = z.object({
  type: z.literal('editor.getConfiguration'),
  requestId: z.string().min(1),
  contextType: z.string().min(1),
  // Range checks belong to the aggregator, which answers with invalid_context.
  contextId: z.number(),
});

/** Pulls the request id out of a message that otherwise failed validation. */
export const RequestIdEnvelope = z.object({ requestId: z.string().min(1) });

export const ClientEventSchema = z.discriminatedUnion('type', [EditorGetConfiguration]);
