/**
 * Minimal JSON-RPC caller for the streamable HTTP endpoint
 */

import { z } from 'zod';

export interface ToolCallResult {
  status: number;
  text: string | undefined;
  isError: boolean | undefined;
}

const toolCallBodySchema = z.object({
  result: z
    .object({
      content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
      isError: z.boolean().optional(),
    })
    .optional(),
});

export async function callCompletionTool(
  url: string,
  args: Record<string, unknown>,
  id: number = 1
): Promise<ToolCallResult> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
    },
    body: JSON.stringify({
      jsonrpc: '2.0',
      id,
      method: 'tools/call',
      params: { name: 'generate_completion', arguments: args },
    }),
  });
  const body = toolCallBodySchema.parse(await response.json());
  return {
    status: response.status,
    text: body.result?.content?.[0]?.text,
    isError: body.result?.isError,
  };
}
