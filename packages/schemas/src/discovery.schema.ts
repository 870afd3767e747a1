/** Shape of the `/json` discovery listing served on the remote-debugging port. */
export const DebugTargetListSchema = {
  type: "array",
  items: {
    type: "object",
    required: ["id", "webSocketDebuggerUrl"],
    properties: {
      id: { type: "string", minLength: 1 },
      type: { type: "string" },
      title: { type: "string" },
      url: { type: "string" },
      webSocketDebuggerUrl: { type: "string", format: "uri" },
      devtoolsFrontendUrl: { type: "string" },
    },
  },
} as const;
