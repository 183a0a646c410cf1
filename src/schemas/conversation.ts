import { z } from "zod";

/**
 * Conversation history items.
 *
 * Input messages are what callers write; output messages are assistant
 * messages folded back into the history from a completed turn.
 */
export const InputMessage = z.object({
  role: z.enum(["user", "assistant", "system", "developer"]),
  content: z.string(),
});

export const OutputText = z.object({
  type: z.literal("output_text"),
  text: z.string(),
});

export const OutputRefusal = z.object({
  type: z.literal("refusal"),
  refusal: z.string(),
});

export const OutputMessage = z.object({
  id: z.string().min(1),
  type: z.literal("message"),
  role: z.literal("assistant"),
  status: z.enum(["in_progress", "completed", "incomplete"]),
  content: z.array(z.discriminatedUnion("type", [OutputText, OutputRefusal])),
});

export const HistoryItem = z.union([InputMessage, OutputMessage]);

export const History = z.array(HistoryItem);

export type InputMessageT = z.infer<typeof InputMessage>;
export type OutputMessageT = z.infer<typeof OutputMessage>;
export type OutputContentT = OutputMessageT["content"][number];
export type HistoryItemT = z.infer<typeof HistoryItem>;
