import { getConfig } from "../config";
import { SkillEngine, type SkillEngineOptions } from "./engine";

let cachedEngine: Promise<SkillEngine> | undefined;

export async function createSkillEngineFromConfig(
  overrides: Partial<SkillEngineOptions> = {}
): Promise<SkillEngine> {
  const cfg = getConfig().skills;
  return SkillEngine.create({
    roots: cfg.roots,
    watch: cfg.watch,
    debounceMs: cfg.debounceMs,
    maxSkills: cfg.maxSkills,
    maxDescriptorBytes: cfg.maxDescriptorBytes,
    maxResourceBytes: cfg.maxResourceBytes,
    ...overrides,
  });
}

/** Process-wide engine built from `skill-index.toml`. A failed start is not cached. */
export function getSkillEngine(): Promise<SkillEngine> {
  if (cachedEngine) return cachedEngine;

  const pending = createSkillEngineFromConfig();
  cachedEngine = pending;
  pending.catch(() => {
    if (cachedEngine === pending) cachedEngine = undefined;
  });
  return pending;
}

export async function _resetSkillEngineForTests() {
  const pending = cachedEngine;
  cachedEngine = undefined;
  if (!pending) return;
  try {
    const engine = await pending;
    engine.stop();
  } catch {
    // startup already failed; nothing to stop
  }
}
