import type Database from "better-sqlite3";
import { defaultMemoryConfig, getLogLevel, loadMemoryConfig, type MemoryConfig } from "@/config";
import { log } from "@/logger";
import { compactObservations, findStaleObservations } from "@/memory/compact";
import { openDatabase, resolveDbPath, type StoreContext } from "@/memory/db";
import { buildContext } from "@/memory/graph";
import {
  countObservations,
  createObservation,
  deleteObservation,
  findByTopicKey,
  getObservation,
  listObservations,
  recentObservations,
  saveObservation,
  updateObservation,
} from "@/memory/observations";
import { passiveCapture } from "@/memory/passive";
import { getProgress, saveProgress } from "@/memory/progress";
import { addPrompt, recentPrompts } from "@/memory/prompts";
import { addRelation, getRelations, removeRelation } from "@/memory/relations";
import { search, searchPrompts } from "@/memory/search";
import { endSession, getSession, recentSessions, startSession } from "@/memory/sessions";
import { formatContext, stats } from "@/memory/stats";
import { timeline } from "@/memory/timeline";
import { exportData, importData, type ExportDocument } from "@/memory/transfer";
import type {
  AddPromptParams,
  AddRelationParams,
  CompactParams,
  CompactResult,
  ContextResult,
  CreateObservationParams,
  ImportResult,
  MemoryStats,
  Observation,
  ObservationListOptions,
  PassiveCaptureParams,
  PassiveCaptureResult,
  Prompt,
  PromptSearchOptions,
  PromptSearchResult,
  Relation,
  SaveProgressParams,
  SearchOptions,
  SearchResult,
  Session,
  SessionSummary,
  StaleObservationOptions,
  TimelineResult,
  UpdateObservationParams,
} from "@/memory/types";
import { systemClock, type Clock } from "@/utils/clock";

export type OpenMemoryStoreOptions = {
  /** Database file, or ":memory:". Defaults to `<dataDir>/memory.db`. */
  path?: string;
  /** Overrides layered on the defaults. When absent, config.toml and the environment are read. */
  config?: Partial<MemoryConfig>;
  clock?: Clock;
};

/**
 * Synchronous facade over one SQLite connection. Every method maps onto a
 * module-level operation that takes the shared {@link StoreContext}.
 */
export class MemoryStore {
  private readonly ctx: StoreContext;
  private closed = false;

  constructor(db: Database.Database, config: MemoryConfig, clock: Clock = systemClock) {
    this.ctx = { db, config, clock };
  }

  get config(): MemoryConfig {
    return this.ctx.config;
  }

  // Sessions

  startSession(id: string, project: string, directory: string): boolean {
    return startSession(this.ctx, id, project, directory);
  }

  endSession(id: string, summary?: string): void {
    endSession(this.ctx, id, summary);
  }

  getSession(id: string): Session | null {
    return getSession(this.ctx, id);
  }

  recentSessions(project?: string, limit?: number): SessionSummary[] {
    return recentSessions(this.ctx, project, limit);
  }

  // Observations

  createObservation(params: CreateObservationParams): number {
    return createObservation(this.ctx, params);
  }

  saveObservation(params: CreateObservationParams): ReturnType<typeof saveObservation> {
    return saveObservation(this.ctx, params);
  }

  getObservation(id: number): Observation {
    return getObservation(this.ctx, id);
  }

  updateObservation(id: number, params: UpdateObservationParams): Observation {
    return updateObservation(this.ctx, id, params);
  }

  deleteObservation(id: number, hard = false): void {
    deleteObservation(this.ctx, id, hard);
  }

  findByTopicKey(key: string, project?: string, scope?: string): Observation | null {
    return findByTopicKey(this.ctx, key, project, scope);
  }

  listObservations(opts?: ObservationListOptions): Observation[] {
    return listObservations(this.ctx, opts);
  }

  recentObservations(project?: string, scope?: string, limit?: number): Observation[] {
    return recentObservations(this.ctx, project, scope, limit);
  }

  countObservations(project?: string, scope?: string): number {
    return countObservations(this.ctx, project, scope);
  }

  // Relations

  addRelation(params: AddRelationParams): number[] {
    return addRelation(this.ctx, params);
  }

  removeRelation(id: number): void {
    removeRelation(this.ctx, id);
  }

  getRelations(observationId: number): Relation[] {
    return getRelations(this.ctx, observationId);
  }

  buildContext(observationId: number, depth?: number): ContextResult {
    return buildContext(this.ctx, observationId, depth);
  }

  // Prompts

  addPrompt(params: AddPromptParams): number {
    return addPrompt(this.ctx, params);
  }

  recentPrompts(project?: string, limit?: number): Prompt[] {
    return recentPrompts(this.ctx, project, limit);
  }

  // Search and browsing

  search(query: string, opts?: SearchOptions): SearchResult[] {
    return search(this.ctx, query, opts);
  }

  searchPrompts(query: string, opts?: PromptSearchOptions): PromptSearchResult[] {
    return searchPrompts(this.ctx, query, opts);
  }

  timeline(observationId: number, before?: number, after?: number): TimelineResult {
    return timeline(this.ctx, observationId, before, after);
  }

  passiveCapture(params: PassiveCaptureParams): PassiveCaptureResult {
    return passiveCapture(this.ctx, params);
  }

  // Maintenance

  saveProgress(params: SaveProgressParams): number {
    return saveProgress(this.ctx, params);
  }

  getProgress(project: string): Observation | null {
    return getProgress(this.ctx, project);
  }

  findStaleObservations(opts: StaleObservationOptions): Observation[] {
    return findStaleObservations(this.ctx, opts);
  }

  compactObservations(params: CompactParams): CompactResult {
    return compactObservations(this.ctx, params);
  }

  stats(): MemoryStats {
    return stats(this.ctx);
  }

  formatContext(project?: string, scope?: string): string {
    return formatContext(this.ctx, project, scope);
  }

  export(): ExportDocument {
    return exportData(this.ctx);
  }

  /** Accepts an {@link ExportDocument} or its JSON text. */
  import(data: unknown): ImportResult {
    return importData(this.ctx, data);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.ctx.db.close();
  }
}

export function openMemoryStore(options: OpenMemoryStoreOptions = {}): MemoryStore {
  let config: MemoryConfig;
  if (options.config) {
    config = { ...defaultMemoryConfig(), ...options.config };
  } else {
    config = loadMemoryConfig();
    log.level = getLogLevel();
  }
  const path = resolveDbPath(config, options.path);
  return new MemoryStore(openDatabase(path, config.busyTimeoutMs), config, options.clock);
}
