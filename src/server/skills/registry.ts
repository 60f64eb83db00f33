import type {
  AgentDescriptor,
  Descriptor,
  DuplicateNameWarning,
  RegistrySnapshot,
  ScanFileError,
  ScanResult,
  SkillDescriptor,
} from "./types";

export type BuildOptions = {
  maxSkills?: number;
  now?: number;
};

function isScanResult(value: ScanResult | Descriptor): value is ScanResult {
  return "descriptors" in value;
}

function pushIndex(index: Map<string, string[]>, key: string, name: string) {
  const list = index.get(key);
  if (list) list.push(name);
  else index.set(key, [name]);
}

function freezeIndex(index: Map<string, string[]>): ReadonlyMap<string, readonly string[]> {
  for (const list of index.values()) Object.freeze(list);
  return index;
}

function freezeDescriptor(descriptor: Descriptor): Descriptor {
  if (descriptor.kind === "skill") {
    Object.freeze(descriptor.categories);
    Object.freeze(descriptor.languages);
    Object.freeze(descriptor.resourceRefs);
  } else {
    Object.freeze(descriptor.declaredCategories);
  }
  return Object.freeze(descriptor);
}

function copyDescriptor(descriptor: Descriptor): Descriptor {
  if (descriptor.kind === "skill") {
    return {
      ...descriptor,
      categories: [...descriptor.categories],
      languages: [...descriptor.languages],
      resourceRefs: [...descriptor.resourceRefs],
    };
  }
  return { ...descriptor, declaredCategories: [...descriptor.declaredCategories] };
}

/**
 * Builds an immutable snapshot from scan output. Input order is authoritative
 * for duplicate resolution: the first descriptor with a given name wins.
 */
export function buildSnapshot(
  input: ReadonlyArray<ScanResult> | ReadonlyArray<Descriptor>,
  generation: number,
  options: BuildOptions = {}
): RegistrySnapshot {
  const roots: string[] = [];
  const descriptors: Descriptor[] = [];
  const errors: ScanFileError[] = [];
  const warnings: string[] = [];

  for (const item of input) {
    if (isScanResult(item)) {
      roots.push(item.root);
      descriptors.push(...item.descriptors);
      errors.push(...item.errors);
      warnings.push(...item.warnings);
    } else {
      descriptors.push(item);
    }
  }

  const maxSkills = Math.max(1, Math.floor(Number(options.maxSkills ?? Infinity)));
  const skills: SkillDescriptor[] = [];
  const agents: AgentDescriptor[] = [];
  const byName = new Map<string, SkillDescriptor>();
  const agentsByName = new Map<string, AgentDescriptor>();
  const duplicates: DuplicateNameWarning[] = [];
  let capped = false;

  for (const original of descriptors) {
    const descriptor = freezeDescriptor(copyDescriptor(original));

    if (descriptor.kind === "agent") {
      const kept = agentsByName.get(descriptor.name);
      if (kept) {
        duplicates.push({
          kind: "DuplicateNameWarning",
          descriptorKind: "agent",
          name: descriptor.name,
          keptPath: kept.sourcePath,
          duplicatePath: descriptor.sourcePath,
        });
        continue;
      }
      agentsByName.set(descriptor.name, descriptor);
      agents.push(descriptor);
      continue;
    }

    const kept = byName.get(descriptor.name);
    if (kept) {
      duplicates.push({
        kind: "DuplicateNameWarning",
        descriptorKind: "skill",
        name: descriptor.name,
        keptPath: kept.sourcePath,
        duplicatePath: descriptor.sourcePath,
      });
      continue;
    }

    if (skills.length >= maxSkills) {
      if (!capped) {
        capped = true;
        warnings.push(`Skills limit reached: max_skills=${maxSkills}`);
      }
      continue;
    }

    byName.set(descriptor.name, descriptor);
    skills.push(descriptor);
  }

  const byCategory = new Map<string, string[]>();
  const byLanguage = new Map<string, string[]>();
  const agnostic: string[] = [];
  for (const skill of skills) {
    for (const category of skill.categories) pushIndex(byCategory, category, skill.name);
    if (skill.languages.length === 0) agnostic.push(skill.name);
    for (const language of skill.languages) pushIndex(byLanguage, language, skill.name);
  }

  for (const duplicate of duplicates) Object.freeze(duplicate);
  for (const error of errors) Object.freeze(error);

  return Object.freeze({
    generation,
    builtAt: options.now ?? Date.now(),
    roots: Object.freeze(roots),
    skills: Object.freeze(skills),
    agents: Object.freeze(agents),
    byName,
    byCategory: freezeIndex(byCategory),
    byLanguage: freezeIndex(byLanguage),
    agnostic: Object.freeze(agnostic),
    errors: Object.freeze(errors),
    duplicates: Object.freeze(duplicates),
    warnings: Object.freeze(warnings),
  });
}

export class SkillRegistry {
  private published: RegistrySnapshot;
  private lastGeneration = 0;

  constructor() {
    this.published = buildSnapshot([], 0, { now: 0 });
  }

  build(
    input: ReadonlyArray<ScanResult> | ReadonlyArray<Descriptor>,
    options: BuildOptions = {}
  ): RegistrySnapshot {
    this.lastGeneration += 1;
    return buildSnapshot(input, this.lastGeneration, options);
  }

  current(): RegistrySnapshot {
    return this.published;
  }

  /**
   * Publishes `snapshot` with a single reference assignment. Snapshots that are
   * not newer than the published one are refused.
   */
  replace(snapshot: RegistrySnapshot): boolean {
    if (snapshot.generation <= this.published.generation) return false;
    this.published = snapshot;
    return true;
  }
}
