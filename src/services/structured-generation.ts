/**
 * One LLM call decoded into a JSON shape.
 * Generation faults and undecodable replies both come back as null so that
 * every call site can substitute its documented default.
 */

import { TextGenerator } from '../clients/text-generator.js';
import { Logger, getErrorMessage } from '../shared/index.js';
import { JsonShape, decodeJsonReply } from '../utils/json-response.js';

export interface StructuredRequest<T> {
  systemPrompt: string;
  prompt: string;
  shape: JsonShape<T>;
  /** Short label for log lines, e.g. "architecture analysis" */
  purpose: string;
}

export async function generateStructured<T>(
  generator: TextGenerator,
  request: StructuredRequest<T>,
  log: Logger
): Promise<T | null> {
  let response: string;
  try {
    response = await generator.generate(request.systemPrompt, request.prompt);
  } catch (error) {
    log.warn(`LLM ${request.purpose} failed, using fallback: ${getErrorMessage(error)}`);
    return null;
  }
  const decoded = decodeJsonReply(response, request.shape);
  if (decoded === null) {
    log.warn(`LLM ${request.purpose} returned an unusable reply, using fallback`);
  }
  return decoded;
}
