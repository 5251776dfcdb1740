const InconsistencyActionSchema = { type: "string", enum: ["abort", "restart", "continue"] } as const;

export const PlayConfigInputSchema = {
  type: "object",
  properties: {
    difficulty: { type: "string", enum: ["beginner", "intermediate", "expert"] },
    width: { type: "integer", minimum: 1, maximum: 1000 },
    height: { type: "integer", minimum: 1, maximum: 1000 },
    mines: { type: "integer", minimum: 0 },
    games: { type: "integer", minimum: 1 },
    seed: { type: "integer" },
    policy: { type: "string", enum: ["corner-then-edge", "corner", "first"] },
    step_delay_ms: { type: "integer", minimum: 0 },
    game_delay_ms: { type: "integer", minimum: 0 },
    engine_timeout_ms: { type: "integer", minimum: 0 },
    first_move_safe: { type: "boolean" },
    max_engine_nodes: { type: "integer", minimum: 1 },
    on_inconsistency: {
      oneOf: [
        InconsistencyActionSchema,
        {
          type: "object",
          properties: {
            out_of_range: InconsistencyActionSchema,
            no_valid_guess_bound: InconsistencyActionSchema,
            global_sum_mismatch: InconsistencyActionSchema,
            local_sum_mismatch: InconsistencyActionSchema,
          },
          additionalProperties: false,
        },
      ],
    },
    journal_path: { type: "string", minLength: 1 },
    metrics: { type: "boolean" },
  },
  additionalProperties: false,
} as const;
