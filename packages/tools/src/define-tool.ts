import type { ActionToolSpec, DelegateToolSpec, Topic } from "@switchboard/types";
import { z } from "zod";

/**
 * Declare an action tool. The handler's argument type follows from the
 * schema, so handlers receive already-validated input.
 */
export function defineTool<TArgs>(
  spec: Omit<ActionToolSpec<TArgs>, "isDelegate">,
): ActionToolSpec<TArgs> {
  return { ...spec, isDelegate: false };
}

export const TransferArgsSchema = z.object({
  reason: z
    .string()
    .optional()
    .describe("Short note on why the conversation is being handed over"),
});

export type TransferArgs = z.infer<typeof TransferArgsSchema>;

/** Declare a delegate tool that hands the session to `target`. */
export function defineDelegate(
  name: string,
  target: Topic,
  description: string,
): DelegateToolSpec<TransferArgs> {
  return {
    name,
    description,
    argumentSchema: TransferArgsSchema,
    isDelegate: true,
    target,
  };
}
