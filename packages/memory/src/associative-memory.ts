import { existsSync } from "node:fs";
import { join } from "node:path";
import type { ConceptNode, ConceptNodeKind, KeywordStrengthData, MemoryStoreCodec } from "@townsim/schemas";
import { validateConceptNodesData, validateKeywordStrengthData } from "@townsim/schemas";
import { readValidatedJson, writeJsonAtomic } from "./store-io.js";

export interface ConceptInput {
  created: Date;
  subject: string;
  predicate: string;
  object: string;
  description: string;
  poignancy: number;
  keywords: Iterable<string>;
  /** Node ids this node was derived from (thoughts). */
  evidence?: string[];
}

export type EventTriple = readonly [subject: string, predicate: string, object: string];

type StrengthKind = keyof KeywordStrengthData;

/** Keywords are matched case-insensitively. */
function normalizeKeywords(keywords: Iterable<string>): string[] {
  return [...new Set([...keywords].map((k) => k.toLowerCase()))];
}

function loadStrength(table: Record<string, number>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const [keyword, count] of Object.entries(table)) {
    const key = keyword.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + count);
  }
  return counts;
}

/**
 * Long-term store of everything an agent has observed (events), concluded
 * (thoughts) and said (chats), with a keyword index over all of them.
 */
export class AssociativeMemory {
  private nodeList: ConceptNode[] = [];
  private byId = new Map<string, ConceptNode>();
  private order = new Map<string, number>();
  private byKeyword = new Map<string, ConceptNode[]>();
  private strength: Record<StrengthKind, Map<string, number>> = {
    event: new Map(),
    thought: new Map(),
  };

  constructor(nodes: ConceptNode[] = [], strength?: KeywordStrengthData) {
    for (const node of nodes) {
      this.index({ ...node, keywords: normalizeKeywords(node.keywords), evidence: [...node.evidence] });
    }
    if (strength) {
      this.strength.event = loadStrength(strength.event);
      this.strength.thought = loadStrength(strength.thought);
    }
  }

  get size(): number {
    return this.nodeList.length;
  }

  addEvent(input: ConceptInput): ConceptNode {
    const node = this.add("event", input, 0);
    if (`${node.predicate} ${node.object}` !== "is idle") this.strengthen("event", node.keywords);
    return node;
  }

  addChat(input: ConceptInput): ConceptNode {
    return this.add("chat", input, 0);
  }

  /** A thought sits one level above the deepest node it was derived from. */
  addThought(input: ConceptInput): ConceptNode {
    let depth = 0;
    for (const id of input.evidence ?? []) {
      const source = this.byId.get(id);
      if (source) depth = Math.max(depth, source.depth);
    }
    const node = this.add("thought", input, depth + 1);
    this.strengthen("thought", node.keywords);
    return node;
  }

  getNode(nodeId: string): ConceptNode | undefined {
    return this.byId.get(nodeId);
  }

  /** Nodes newest first, optionally of one kind. */
  nodes(kind?: ConceptNodeKind): ConceptNode[] {
    const all = kind ? this.nodeList.filter((n) => n.kind === kind) : this.nodeList;
    return [...all].reverse();
  }

  /** (subject, predicate, object) of the most recent events, newest first. */
  latestEventSummaries(retention: number): EventTriple[] {
    return this.nodes("event")
      .slice(0, Math.max(0, retention))
      .map((n) => [n.subject, n.predicate, n.object] as const);
  }

  /** Nodes of one kind that carry any of the keywords, newest first, each once. */
  retrieveByKeywords(keywords: Iterable<string>, kind: ConceptNodeKind, limit?: number): ConceptNode[] {
    const seen = new Set<string>();
    const matches: ConceptNode[] = [];
    for (const keyword of keywords) {
      for (const node of this.byKeyword.get(keyword.toLowerCase()) ?? []) {
        if (node.kind !== kind || seen.has(node.node_id)) continue;
        seen.add(node.node_id);
        matches.push(node);
      }
    }
    matches.sort((a, b) => this.position(b) - this.position(a));
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  touch(nodeIds: Iterable<string>, at: Date): void {
    const stamp = at.toISOString();
    for (const id of nodeIds) {
      const node = this.byId.get(id);
      if (node) node.last_accessed = stamp;
    }
  }

  keywordStrength(kind: StrengthKind, keyword: string): number {
    return this.strength[kind].get(keyword.toLowerCase()) ?? 0;
  }

  toJSON(): { nodes: ConceptNode[]; kw_strength: KeywordStrengthData } {
    return {
      nodes: this.nodeList.map((n) => ({ ...n, keywords: [...n.keywords], evidence: [...n.evidence] })),
      kw_strength: {
        event: Object.fromEntries(this.strength.event),
        thought: Object.fromEntries(this.strength.thought),
      },
    };
  }

  private add(kind: ConceptNodeKind, input: ConceptInput, depth: number): ConceptNode {
    const created = input.created.toISOString();
    let seq = this.nodeList.length + 1;
    while (this.byId.has(`node_${seq}`)) seq++;
    const node: ConceptNode = {
      node_id: `node_${seq}`,
      kind,
      type_count: this.nodeList.filter((n) => n.kind === kind).length + 1,
      depth,
      created,
      last_accessed: created,
      subject: input.subject,
      predicate: input.predicate,
      object: input.object,
      description: input.description,
      poignancy: input.poignancy,
      keywords: normalizeKeywords(input.keywords),
      evidence: [...(input.evidence ?? [])],
    };
    this.index(node);
    return node;
  }

  private index(node: ConceptNode): void {
    this.order.set(node.node_id, this.nodeList.length);
    this.nodeList.push(node);
    this.byId.set(node.node_id, node);
    for (const keyword of node.keywords) {
      const bucket = this.byKeyword.get(keyword);
      if (bucket) bucket.push(node);
      else this.byKeyword.set(keyword, [node]);
    }
  }

  private position(node: ConceptNode): number {
    return this.order.get(node.node_id) ?? -1;
  }

  private strengthen(kind: StrengthKind, keywords: string[]): void {
    const table = this.strength[kind];
    for (const keyword of keywords) table.set(keyword, (table.get(keyword) ?? 0) + 1);
  }
}

const NODES_FILE = "nodes.json";
const STRENGTH_FILE = "kw_strength.json";

/** Stored as a directory: `nodes.json` and, optionally, `kw_strength.json`. */
export const associativeMemoryCodec: MemoryStoreCodec<AssociativeMemory> = {
  async load(path) {
    const nodes = await readValidatedJson(join(path, NODES_FILE), validateConceptNodesData);
    const strengthPath = join(path, STRENGTH_FILE);
    const strength = existsSync(strengthPath)
      ? await readValidatedJson(strengthPath, validateKeywordStrengthData)
      : undefined;
    return new AssociativeMemory(nodes, strength);
  },
  async save(memory, path) {
    const { nodes, kw_strength } = memory.toJSON();
    await writeJsonAtomic(join(path, NODES_FILE), nodes);
    await writeJsonAtomic(join(path, STRENGTH_FILE), kw_strength);
  },
};
