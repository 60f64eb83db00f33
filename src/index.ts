export { getConfig, parseConfigToml, type SkillIndexConfig } from "./server/config";
export { logEvent, type LogLevel } from "./server/log";
export { SkillEngine, type ReloadOutcome, type SkillEngineOptions } from "./server/skills/engine";
export * from "./server/skills/errors";
export { type PublicRegistrySummary, redactSnapshotForPublic } from "./server/skills/redact";
export { SkillRegistry, buildSnapshot } from "./server/skills/registry";
export {
  ANY_CATEGORY,
  normalizeMatchRequest,
  rankCandidates,
  resolve,
} from "./server/skills/resolver";
export { type SkillResource, readSkillResource } from "./server/skills/resources";
export { createSkillEngineFromConfig, getSkillEngine } from "./server/skills/runtime";
export { scanTree } from "./server/skills/scanner";
export {
  parseDescriptor,
  serializeDescriptorHeader,
  type ParseDescriptorResult,
} from "./server/skills/skill-md";
export type * from "./server/skills/types";
export { ChangeWatcher, type WatchFactory } from "./server/skills/watcher";
