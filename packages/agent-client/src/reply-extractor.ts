import { z } from 'zod';

export const FALLBACK_REPLY = "I received your message but couldn't generate a proper response.";

/**
 * One accepted response layout. `extract` returns the assistant text when the
 * response matches, or `undefined` to let the next shape try.
 */
export interface ReplyShape {
  name: string;
  extract(response: unknown): string | undefined;
}

export type ReplyExtractor = (response: unknown) => string;

const textPartSchema = z.object({ text: z.string() }).passthrough();

const contentSchema = z
  .object({
    content: z.object({ parts: z.array(z.unknown()).min(1) }).passthrough(),
  })
  .passthrough();

const candidatesSchema = z
  .object({ candidates: z.array(z.unknown()).min(1) })
  .passthrough();

const legacySchema = z
  .object({
    response: z.object({ parts: z.array(z.unknown()).min(1) }).passthrough(),
  })
  .passthrough();

const messageSchema = z
  .object({
    role: z.unknown().optional(),
    parts: z.array(z.unknown()).optional(),
  })
  .passthrough();

const dataMessagesSchema = z
  .object({
    data: z.object({ messages: z.array(z.unknown()) }).passthrough(),
  })
  .passthrough();

/** `candidates[0].content.parts[0].text` */
export const candidatesShape: ReplyShape = {
  name: 'candidates',
  extract(response) {
    const parsed = candidatesSchema.safeParse(response);
    return parsed.success ? firstPartText(parsed.data.candidates[0]) : undefined;
  },
};

/** A top-level list: `[0].content.parts[0].text` */
export const eventListShape: ReplyShape = {
  name: 'event-list',
  extract(response) {
    if (!Array.isArray(response) || response.length === 0) {
      return undefined;
    }
    return firstPartText(response[0]);
  },
};

/** `response.parts[0].text` */
export const legacyResponseShape: ReplyShape = {
  name: 'legacy-response',
  extract(response) {
    const parsed = legacySchema.safeParse(response);
    return parsed.success ? partText(parsed.data.response.parts[0]) : undefined;
  },
};

/**
 * `data.messages`, scanned from the end. The first `model` message found
 * contributes all of its text parts and ends the scan, even when it has none.
 */
export const dataMessagesShape: ReplyShape = {
  name: 'data-messages',
  extract(response) {
    const parsed = dataMessagesSchema.safeParse(response);
    if (!parsed.success) {
      return undefined;
    }

    const { messages } = parsed.data.data;
    for (let index = messages.length - 1; index >= 0; index -= 1) {
      const message = messageSchema.safeParse(messages[index]);
      if (!message.success || message.data.role !== 'model') {
        continue;
      }

      return (message.data.parts ?? [])
        .map((part) => partText(part) ?? '')
        .join('');
    }

    return undefined;
  },
};

/** Accepted layouts in priority order. */
export const DEFAULT_REPLY_SHAPES: readonly ReplyShape[] = [
  candidatesShape,
  eventListShape,
  legacyResponseShape,
  dataMessagesShape,
];

/**
 * Build a total extractor over the given shapes: the first non-empty text
 * wins, and {@link FALLBACK_REPLY} is returned when none matches.
 */
export function createReplyExtractor(
  shapes: readonly ReplyShape[] = DEFAULT_REPLY_SHAPES,
  fallback: string = FALLBACK_REPLY,
): ReplyExtractor {
  return (response) => {
    for (const shape of shapes) {
      const text = shape.extract(response);
      if (text) {
        return text;
      }
    }
    return fallback;
  };
}

export const extractReplyText: ReplyExtractor = createReplyExtractor();

function firstPartText(item: unknown): string | undefined {
  const parsed = contentSchema.safeParse(item);
  return parsed.success ? partText(parsed.data.content.parts[0]) : undefined;
}

function partText(part: unknown): string | undefined {
  const parsed = textPartSchema.safeParse(part);
  return parsed.success ? parsed.data.text : undefined;
}
