import { z } from "zod"

// ──────────────────────────────────────────────────
// On-disk session format: one JSON file per named session
// ──────────────────────────────────────────────────

export const StoredMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
  id: z.string().optional(),
  timestamp: z.string().optional(),
})

export type StoredMessage = z.infer<typeof StoredMessageSchema>

export const StoredSessionSchema = z.object({
  id: z.string().optional(),
  createdAt: z.string().optional(),
  messages: z.array(StoredMessageSchema).default([]),
})

export type StoredSession = z.infer<typeof StoredSessionSchema>
