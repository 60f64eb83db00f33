import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import TOML from "@iarna/toml";

const SkillsSchema = z
  .object({
    roots: z.array(z.string().min(1)).min(1).optional(),
    watch: z.boolean().optional(),
    debounce_ms: z.number().int().min(10).max(10_000).optional(),
    max_skills: z.number().int().min(1).max(10_000).optional(),
    max_descriptor_bytes: z.number().int().min(1_000).max(10_000_000).optional(),
    max_resource_bytes: z.number().int().min(1_000).max(100_000_000).optional(),
  })
  .optional();

const RawConfigSchema = z.object({
  version: z.literal(1),
  skills: SkillsSchema,
});

export type SkillIndexConfig = {
  version: 1;
  skills: {
    roots: string[];
    watch: boolean;
    debounceMs: number;
    maxSkills: number;
    maxDescriptorBytes: number;
    maxResourceBytes: number;
  };
};

const DEFAULT_SKILLS_CONFIG: SkillIndexConfig["skills"] = {
  roots: ["./"],
  watch: true,
  debounceMs: 150,
  maxSkills: 500,
  maxDescriptorBytes: 200_000,
  maxResourceBytes: 2_000_000,
};

let cachedConfig: SkillIndexConfig | null = null;

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function resolveRoot(raw: string, baseDir: string): string {
  const expanded = expandHome(raw.trim());
  const resolved = path.isAbsolute(expanded)
    ? path.normalize(expanded)
    : path.resolve(baseDir, expanded);
  return resolved.length > 1 ? resolved.replace(/\/+$/, "") : resolved;
}

function normalizeConfig(raw: z.infer<typeof RawConfigSchema>): SkillIndexConfig {
  const skills = raw.skills ?? {};
  const baseDir = process.cwd();

  const roots: string[] = [];
  const seen = new Set<string>();
  for (const entry of skills.roots ?? DEFAULT_SKILLS_CONFIG.roots) {
    const resolved = resolveRoot(entry, baseDir);
    if (seen.has(resolved)) continue;
    seen.add(resolved);
    roots.push(resolved);
  }

  return {
    version: 1,
    skills: {
      roots,
      watch: skills.watch ?? DEFAULT_SKILLS_CONFIG.watch,
      debounceMs: skills.debounce_ms ?? DEFAULT_SKILLS_CONFIG.debounceMs,
      maxSkills: skills.max_skills ?? DEFAULT_SKILLS_CONFIG.maxSkills,
      maxDescriptorBytes:
        skills.max_descriptor_bytes ?? DEFAULT_SKILLS_CONFIG.maxDescriptorBytes,
      maxResourceBytes: skills.max_resource_bytes ?? DEFAULT_SKILLS_CONFIG.maxResourceBytes,
    },
  };
}

function configPath() {
  const fromEnv = process.env.SKILL_INDEX_CONFIG_PATH;
  if (fromEnv && fromEnv.trim()) return fromEnv.trim();
  return path.join(process.cwd(), "skill-index.toml");
}

function tomlToPlainObject(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => tomlToPlainObject(item));
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = tomlToPlainObject(inner);
    }
    return out;
  }
  return value;
}

export function parseConfigToml(content: string): SkillIndexConfig {
  const parsed = TOML.parse(content);
  const raw = RawConfigSchema.parse(tomlToPlainObject(parsed));
  return normalizeConfig(raw);
}

export function getConfig(): SkillIndexConfig {
  if (cachedConfig) return cachedConfig;

  const filePath = configPath();
  if (!fs.existsSync(filePath)) {
    throw new Error(
      [
        `Missing skill-index config file: ${filePath}`,
        "",
        "Create it by copying `skill-index.toml.example` to `skill-index.toml`.",
        "Or set `SKILL_INDEX_CONFIG_PATH` to point at your config file.",
      ].join("\n")
    );
  }

  const stat = fs.statSync(filePath);
  if (!stat.isFile()) {
    throw new Error(`skill-index config path is not a file: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  cachedConfig = parseConfigToml(content);
  return cachedConfig;
}

export function _resetConfigCacheForTests() {
  cachedConfig = null;
}
