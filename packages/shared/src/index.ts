// Types
export * from "./types/geometry.types";
export * from "./types/decision.types";
export * from "./types/agentEvent.types";
export * from "./types/capture.types";
export * from "./types/bridge.types";

// Errors
export * from "./errors/agent.errors";

// Geometry
export * from "./geometry/displayLayout";
export * from "./geometry/resolutionMapper";

// Utils
export * from "./utils/decision.utils";
export * from "./utils/bridge.utils";
export * from "./utils/serialQueue";
