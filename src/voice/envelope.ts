import { z } from 'zod';
import type { MediaRequestIntent } from '../types.js';

export const TITLE_SLOT = 'MediaTitle';
export const ALL_SEASONS_SLOT = 'all';

const slotSchema = z.object({
  name: z.string().optional(),
  value: z.string().optional(),
});

export const voiceRequestSchema = z.object({
  version: z.string().optional(),
  session: z
    .object({
      sessionId: z.string().optional(),
      user: z.object({ userId: z.string().optional() }).optional(),
    })
    .optional(),
  request: z.object({
    type: z.string(),
    requestId: z.string().optional(),
    intent: z
      .object({
        name: z.string(),
        slots: z.record(slotSchema).optional(),
      })
      .optional(),
  }),
});

export type VoiceRequest = z.infer<typeof voiceRequestSchema>;

export interface VoiceResponse {
  version: '1.0';
  response: {
    outputSpeech: {
      type: 'PlainText';
      text: string;
    };
    shouldEndSession: true;
  };
}

/**
 * Reads the title and all-seasons slots. Requests without an intent
 * (LaunchRequest and friends) come back with an empty title.
 */
export function extractIntent(request: VoiceRequest): MediaRequestIntent {
  const slots = request.request.intent?.slots ?? {};
  return {
    title: slots[TITLE_SLOT]?.value ?? '',
    requestAllSeasons: (slots[ALL_SEASONS_SLOT]?.value ?? 'false').toLowerCase() === 'true',
    sessionId: request.session?.sessionId,
    userId: request.session?.user?.userId,
  };
}

export function buildResponse(text: string): VoiceResponse {
  return {
    version: '1.0',
    response: {
      outputSpeech: {
        type: 'PlainText',
        text,
      },
      shouldEndSession: true,
    },
  };
}
