import { ResponseFormatError } from './errors';

/**
 * Removes a surrounding Markdown code fence (```json ... ``` or ``` ... ```).
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice('```json'.length).trim();
  }
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3).trim();
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3).trim();
  }
  return cleaned;
}

/**
 * Extracts a JSON object from text that may contain other content.
 * Finds the first '{' and last '}' and parses the content between them.
 *
 * @param context - Optional context for error messages (e.g., 'generation', 'explanation')
 * @throws ResponseFormatError if no valid JSON object is found
 */
export function extractJsonObject(text: string, context?: string): unknown {
  const cleaned = stripCodeFences(text);
  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');

  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    const contextStr = context ? ` in ${context} response` : '';
    throw new ResponseFormatError(`No JSON object found${contextStr}.`);
  }

  const jsonText = cleaned.slice(firstBrace, lastBrace + 1);

  try {
    return JSON.parse(jsonText) as unknown;
  } catch (e) {
    const contextStr = context ? ` from ${context} response` : '';
    throw new ResponseFormatError(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }
}
