const CellStateSchema = {
  oneOf: [
    { type: "string", enum: ["hidden", "flag"] },
    { type: "integer", minimum: 0, maximum: 8 },
  ],
} as const;

const ProbabilitySchema = {
  oneOf: [{ type: "number" }, { type: "null" }],
} as const;

export const ProbabilitySnapshotSchema = {
  type: "object",
  required: ["state", "probabilities", "mines_remaining"],
  properties: {
    state: {
      type: "array",
      minItems: 1,
      items: { type: "array", minItems: 1, items: CellStateSchema },
    },
    probabilities: {
      type: "array",
      minItems: 1,
      items: { type: "array", minItems: 1, items: ProbabilitySchema },
    },
    mines_remaining: { type: "integer" },
    mode: { type: "string", enum: ["guess", "open"] },
  },
  additionalProperties: false,
} as const;
