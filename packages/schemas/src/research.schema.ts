const citations = { type: "array", items: { type: "integer", minimum: 1 } } as const;

export const ResearchSchema = {
  type: "object",
  required: ["resources", "estimates", "validation_checklists", "open_questions", "used_sources"],
  properties: {
    resources: {
      type: "array",
      items: {
        type: "object",
        required: ["workstream"],
        properties: {
          workstream: { type: "string" },
          tools: { type: "array", items: { type: "string" } },
          templates: { type: "array", items: { type: "string" } },
          citations,
        },
      },
    },
    estimates: {
      type: "array",
      items: {
        type: "object",
        required: ["workstream", "effort"],
        properties: {
          workstream: { type: "string" },
          effort: { type: "string", enum: ["S", "M", "L"] },
          notes: { type: "string" },
          citations,
        },
      },
    },
    validation_checklists: {
      type: "array",
      items: {
        type: "object",
        required: ["workstream", "checklist"],
        properties: {
          workstream: { type: "string" },
          checklist: { type: "array", items: { type: "string" } },
          citations,
        },
      },
    },
    open_questions: { type: "array", items: { type: "string" } },
    used_sources: citations,
  },
} as const;
