import type { RequestPipeline } from '../pipeline/pipeline.js';
import { MESSAGES } from '../pipeline/formatter.js';
import { logger } from '../utils/logger.js';
import { buildResponse, extractIntent, voiceRequestSchema, type VoiceResponse } from './envelope.js';

export async function handleVoiceEvent(pipeline: RequestPipeline, event: unknown): Promise<VoiceResponse> {
  const parsed = voiceRequestSchema.safeParse(event);
  if (!parsed.success) {
    logger.warn(`Malformed voice request: ${parsed.error.message}`);
    return buildResponse(MESSAGES.emptyQuery);
  }

  const { text } = await pipeline.run(extractIntent(parsed.data));
  return buildResponse(text);
}

export type VoiceHandler = (event: unknown) => Promise<VoiceResponse>;

/**
 * Binds a function-host handler to a ready pipeline.
 */
export function createHandler(pipeline: RequestPipeline): VoiceHandler {
  return (event: unknown) => handleVoiceEvent(pipeline, event);
}
