import type { ExtractedFields } from '../types/permit';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strips a surrounding Markdown code fence (```json ... ```) if present.
 */
export function stripCodeFence(content: string): string {
  let clean = content.trim();
  const fence = clean.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  if (fence) {
    clean = fence[1].trim();
  }
  return clean;
}

/**
 * Reads a chat model reply as a field map. Replies that are not a JSON object
 * are kept verbatim under `raw_response` so the validator can inspect them.
 */
export function parseModelReply(content: string): ExtractedFields {
  const parsed = tryParseJson(stripCodeFence(content));
  return isPlainObject(parsed) ? parsed : { raw_response: content };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
