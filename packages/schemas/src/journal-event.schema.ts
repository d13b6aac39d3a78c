export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "agent", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    agent: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "agent.loaded", "agent.saved",
        "tick.started", "tick.phase", "tick.completed", "tick.failed",
        "conversation.opened", "conversation.failed",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
