// ============================================
// Live-Reload Wire Messages
// ============================================

import { Err, Ok, type Result } from "@mdlive/shared";
import { z } from "zod";

/** Tell clients to reload; `path` is relative to the serve root, or null for "everything" */
export interface ReloadMessage {
  type: "reload";
  path: string | null;
}

export interface ErrorMessage {
  type: "error";
  message: string;
}

/** Reply to a client-level ping */
export interface PongMessage {
  type: "pong";
}

/**
 * Server → client message. One JSON object per text frame.
 */
export type LiveMessage = ReloadMessage | ErrorMessage | PongMessage;

export function reloadMessage(path: string | null): ReloadMessage {
  return { type: "reload", path };
}

export function errorMessage(message: string): ErrorMessage {
  return { type: "error", message };
}

export function encodeLiveMessage(message: LiveMessage): string {
  return JSON.stringify(message);
}

// ============================================
// Client → server
// ============================================

export const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("pong") }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/**
 * Parse an inbound text frame.
 */
export function parseClientMessage(raw: string): Result<ClientMessage, Error> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return Err(new Error("Client message is not valid JSON", { cause: error }));
  }

  const parsed = ClientMessageSchema.safeParse(json);
  if (!parsed.success) {
    return Err(new Error(`Unsupported client message: ${parsed.error.issues[0]?.message ?? "invalid"}`));
  }
  return Ok(parsed.data);
}
