import path from "node:path";
import { logEvent } from "../log";
import { RootUnreadableError, SkillNotFoundError } from "./errors";
import { type PublicRegistrySummary, redactPath, redactSnapshotForPublic } from "./redact";
import { SkillRegistry } from "./registry";
import { resolve } from "./resolver";
import { type SkillResource, readSkillResource } from "./resources";
import { normalizeRoot, scanTree } from "./scanner";
import type {
  AgentDescriptor,
  MatchRequest,
  MatchResult,
  RegistrySnapshot,
  SkillDescriptor,
} from "./types";
import { ChangeWatcher, type WatchFactory } from "./watcher";

export type SkillEngineOptions = {
  roots: readonly string[];
  watch?: boolean;
  debounceMs?: number;
  maxSkills?: number;
  maxDescriptorBytes?: number;
  maxResourceBytes?: number;
  watchFactory?: WatchFactory;
};

export type ReloadOutcome =
  | { published: true; snapshot: RegistrySnapshot }
  | { published: false; snapshot: RegistrySnapshot; error: string | null };

type ResolvedOptions = {
  roots: string[];
  watch: boolean;
  debounceMs: number;
  maxSkills: number;
  maxDescriptorBytes: number;
  maxResourceBytes: number;
  watchFactory?: WatchFactory;
};

function resolveOptions(options: SkillEngineOptions): ResolvedOptions {
  const roots: string[] = [];
  for (const root of options.roots ?? []) {
    if (!String(root ?? "").trim()) continue;
    const normalized = normalizeRoot(root);
    if (!roots.includes(normalized)) roots.push(normalized);
  }
  if (roots.length === 0) throw new Error("SkillEngine requires at least one root directory");

  return {
    roots,
    watch: Boolean(options.watch ?? false),
    debounceMs: options.debounceMs ?? 150,
    maxSkills: options.maxSkills ?? 500,
    maxDescriptorBytes: options.maxDescriptorBytes ?? 200_000,
    maxResourceBytes: options.maxResourceBytes ?? 2_000_000,
    watchFactory: options.watchFactory,
  };
}

/**
 * Entry point for callers. Queries always run against one snapshot captured
 * at call time; reloads publish a new snapshot without blocking readers.
 */
export class SkillEngine {
  private readonly registry = new SkillRegistry();
  private readonly watchers: ChangeWatcher[] = [];
  private readonly options: ResolvedOptions;

  private constructor(options: ResolvedOptions) {
    this.options = options;
  }

  /**
   * Scans every root and publishes the first snapshot. Watchers are armed
   * before the scan so edits made while it runs still trigger a reload.
   * Rejects with `RootUnreadableError`.
   */
  static async create(options: SkillEngineOptions): Promise<SkillEngine> {
    const engine = new SkillEngine(resolveOptions(options));
    if (engine.options.watch) engine.startWatching();
    try {
      const snapshot = await engine.rebuild();
      engine.publish(snapshot);
    } catch (err) {
      engine.stop();
      throw err;
    }
    return engine;
  }

  get roots(): readonly string[] {
    return this.options.roots;
  }

  get watching(): boolean {
    return this.watchers.some((w) => w.active);
  }

  snapshot(): RegistrySnapshot {
    return this.registry.current();
  }

  query(request: MatchRequest): MatchResult {
    const snapshot = this.registry.current();
    return resolve(snapshot, request);
  }

  resolve(
    language: string | null,
    categories: readonly string[],
    keywords: readonly string[]
  ): MatchResult {
    return this.query({ language, categories, keywords });
  }

  getSkill(name: string): SkillDescriptor | null {
    const key = String(name ?? "").trim();
    if (!key) return null;
    return this.registry.current().byName.get(key) ?? null;
  }

  listSkills(): { name: string; description: string }[] {
    return this.registry.current().skills.map((s) => ({ name: s.name, description: s.description }));
  }

  getAgent(name: string): AgentDescriptor | null {
    const key = String(name ?? "").trim();
    if (!key) return null;
    return this.registry.current().agents.find((a) => a.name === key) ?? null;
  }

  listAgents(): readonly AgentDescriptor[] {
    return this.registry.current().agents;
  }

  publicSummary(): PublicRegistrySummary {
    return redactSnapshotForPublic(this.registry.current());
  }

  readResource(name: string, relativePath: string): SkillResource {
    const skill = this.getSkill(name);
    if (!skill) throw new SkillNotFoundError(`Unknown skill: ${String(name ?? "").trim()}`);
    return readSkillResource({
      skillDir: path.dirname(skill.sourcePath),
      relativePath,
      maxBytes: this.options.maxResourceBytes,
    });
  }

  /**
   * Rescans and publishes. An unreadable root keeps the last good snapshot
   * in place and reports the failure instead of throwing.
   */
  async reload(): Promise<ReloadOutcome> {
    let snapshot: RegistrySnapshot;
    try {
      snapshot = await this.rebuild();
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logEvent("warn", "skills.reload_failed", {
        error: err instanceof RootUnreadableError ? "root unreadable" : error,
        roots: this.options.roots.map((r) => redactPath(r)),
        keptGeneration: this.registry.current().generation,
      });
      return { published: false, snapshot: this.registry.current(), error };
    }

    if (!this.publish(snapshot)) {
      return { published: false, snapshot: this.registry.current(), error: null };
    }
    return { published: true, snapshot };
  }

  stop() {
    for (const watcher of this.watchers.splice(0)) watcher.stop();
  }

  private startWatching() {
    for (const root of this.options.roots) {
      const watcher = new ChangeWatcher({
        debounceMs: this.options.debounceMs,
        watch: this.options.watchFactory,
      });
      watcher.start(root, () => this.reload());
      this.watchers.push(watcher);
    }
  }

  private async rebuild(): Promise<RegistrySnapshot> {
    const scans = await Promise.all(
      this.options.roots.map((root) =>
        scanTree(root, { maxDescriptorBytes: this.options.maxDescriptorBytes })
      )
    );
    return this.registry.build(scans, { maxSkills: this.options.maxSkills });
  }

  private publish(snapshot: RegistrySnapshot): boolean {
    const replaced = this.registry.replace(snapshot);
    if (!replaced) {
      logEvent("debug", "skills.reload_stale", { generation: snapshot.generation });
      return false;
    }

    logEvent("info", "skills.scan", {
      generation: snapshot.generation,
      roots: snapshot.roots.map((r) => redactPath(r)),
      skillsCount: snapshot.skills.length,
      agentsCount: snapshot.agents.length,
      errorsCount: snapshot.errors.length,
      duplicatesCount: snapshot.duplicates.length,
      warningsCount: snapshot.warnings.length,
    });
    if (snapshot.skills.length === 0) {
      logEvent("warn", "skills.reload_empty", { generation: snapshot.generation });
    }
    return true;
  }
}
