import { z } from 'zod';
import { LlmResponseError } from '../errors/retrieval-errors';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

/**
 * Parse a model reply as JSON and validate it. Replies wrapped in a markdown
 * code fence are unwrapped first.
 * @throws LlmResponseError when the reply is not JSON or fails the schema
 */
export function parseLlmJson<S extends z.ZodTypeAny>(
  reply: string,
  schema: S,
  operation: string,
): z.infer<S> {
  const fenced = FENCED_BLOCK.exec(reply);
  const text = (fenced ? fenced[1] : reply).trim();

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new LlmResponseError(operation, 'not valid JSON');
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new LlmResponseError(operation, `${path}${issue.message}`);
  }
  return parsed.data;
}
