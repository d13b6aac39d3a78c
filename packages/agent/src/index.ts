export { AgentOrchestrator } from "./orchestrator.js";
export type { AgentOrchestratorConfig } from "./orchestrator.js";
export { computeDayFlag } from "./day-flag.js";
export { ProximityPerceiver } from "./perceiver.js";
export type { ProximityPerceiverOptions } from "./perceiver.js";
export { KeywordRetriever } from "./retriever.js";
export type { KeywordRetrieverOptions } from "./retriever.js";
export type {
  AgentContext,
  Peers,
  RetrievedEntry,
  RetrievedMemories,
  Perceiver,
  Retriever,
  Planner,
  Reflector,
  Executor,
  ConversationEngine,
  CognitionModules,
} from "./cognition.js";
