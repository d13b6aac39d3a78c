import type { ConceptNode } from "@townsim/schemas";
import type { AgentContext, RetrievedMemories, Retriever } from "./cognition.js";

export interface KeywordRetrieverOptions {
  /** Newest events and thoughts kept per perceived node, each. */
  limit: number;
}

/** Looks up memories that share a keyword with each perceived node. */
export class KeywordRetriever implements Retriever {
  constructor(private readonly options: KeywordRetrieverOptions) {}

  async retrieve(agent: AgentContext, perceived: ConceptNode[]): Promise<RetrievedMemories> {
    const retrieved: RetrievedMemories = new Map();
    for (const focus of perceived) {
      const events = agent.associative
        .retrieveByKeywords(focus.keywords, "event")
        .filter((node) => node.node_id !== focus.node_id)
        .slice(0, this.options.limit);
      const thoughts = agent.associative.retrieveByKeywords(focus.keywords, "thought", this.options.limit);
      retrieved.set(focus.description, { focus, events, thoughts });
    }
    return retrieved;
  }
}
