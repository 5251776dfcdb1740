export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "run_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    run_id: { type: "string", minLength: 1 },
    game_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "run.started", "run.completed", "run.cancelled",
        "game.started", "game.ended", "game.failed",
        "step.completed", "mine.flagged", "guess.taken", "cells.opened",
        "verification.failed",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
