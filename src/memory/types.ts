export type Scope = "project" | "personal";
export type DetailLevel = "summary" | "standard" | "full";
export type Direction = "outgoing" | "incoming";

export type Session = {
  id: string;
  project: string;
  directory: string;
  startedAt: string;
  endedAt: string | null;
  summary: string | null;
};

export type SessionSummary = Omit<Session, "directory"> & {
  observationCount: number;
};

export type Observation = {
  id: number;
  sessionId: string;
  type: string;
  title: string;
  content: string;
  toolName: string | null;
  project: string | null;
  scope: Scope;
  topicKey: string | null;
  revisionCount: number;
  duplicateCount: number;
  lastSeenAt: string | null;
  createdAt: string;
  updatedAt: string;
  deletedAt: string | null;
};

/** The lightweight projection graph traversal reports for each neighbour. */
export type ObservationMeta = Pick<Observation, "id" | "title" | "type" | "project" | "createdAt">;

export type CreateObservationParams = {
  sessionId: string;
  type: string;
  title: string;
  content: string;
  toolName?: string;
  project?: string;
  scope?: string;
  topicKey?: string;
};

export type UpdateObservationParams = {
  type?: string;
  title?: string;
  content?: string;
  project?: string;
  scope?: string;
  topicKey?: string;
};

export type ObservationListOptions = {
  project?: string;
  scope?: string;
  type?: string;
  sessionId?: string;
  limit?: number;
  offset?: number;
};

export type Relation = {
  id: number;
  fromId: number;
  toId: number;
  type: string;
  note: string | null;
  createdAt: string;
};

export type AddRelationParams = {
  fromId: number;
  toId: number;
  type?: string;
  note?: string;
  bidirectional?: boolean;
};

export type ContextNode = ObservationMeta & {
  relationType: string;
  direction: Direction;
  note: string | null;
  depth: number;
};

export type ContextResult = {
  root: Observation;
  connected: ContextNode[];
  totalNodes: number;
  maxDepth: number;
};

export type Prompt = {
  id: number;
  sessionId: string;
  content: string;
  project: string | null;
  createdAt: string;
};

export type AddPromptParams = {
  sessionId: string;
  content: string;
  project?: string;
};

export type SearchOptions = {
  type?: string;
  project?: string;
  scope?: string;
  limit?: number;
};

export type PromptSearchOptions = {
  project?: string;
  limit?: number;
};

/** FTS5 bm25 rank: lower is a better match; recency fallbacks report 0. */
export type SearchResult = Observation & { rank: number };
export type PromptSearchResult = Prompt & { rank: number };

export type TimelineResult = {
  focus: Observation;
  before: Observation[];
  after: Observation[];
  session: Session | null;
  totalInSession: number;
};

export type PassiveCaptureParams = {
  sessionId: string;
  content: string;
  project?: string;
  source?: string;
};

export type PassiveCaptureResult = {
  extracted: number;
  saved: number;
  duplicates: number;
};

export type MemoryStats = {
  totalSessions: number;
  totalObservations: number;
  totalPrompts: number;
  projects: string[];
};

export type StaleObservationOptions = {
  project?: string;
  scope?: string;
  olderThanDays: number;
  limit?: number;
};

export type CompactParams = {
  ids: number[];
  summaryTitle?: string;
  summaryContent?: string;
  project?: string;
  scope?: string;
  sessionId?: string;
};

export type CompactResult = {
  deletedCount: number;
  totalBefore: number;
  totalAfter: number;
  summaryId: number | null;
};

export type SaveProgressParams = {
  project: string;
  content: string;
  sessionId?: string;
};

export type ImportResult = {
  sessionsImported: number;
  observationsImported: number;
  promptsImported: number;
};
