import path from "node:path";
import YAML from "yaml";
import {
  DescriptorError,
  EmptyCategoriesError,
  InvalidNameError,
  MalformedHeaderError,
  MissingFieldError,
} from "./errors";
import type { AgentDescriptor, Descriptor, DescriptorKind, SkillDescriptor } from "./types";

export const SKILL_FILE_NAME = "SKILL.md";
export const AGENT_FILE_SUFFIX = ".agent.md";

const NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

type HeaderValue = string | null | string[];
type Header = Record<string, HeaderValue>;

export type ParseDescriptorOptions = {
  kind?: DescriptorKind;
  lastModified?: number;
};

export type ParseDescriptorResult =
  | { ok: true; descriptor: Descriptor }
  | { ok: false; error: DescriptorError };

function decode(input: string | Uint8Array): string {
  const text = typeof input === "string" ? input : Buffer.from(input).toString("utf8");
  return text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

/**
 * Splits `---` delimited YAML frontmatter from the body and checks that the
 * header is a flat mapping of scalars or scalar lists.
 */
export function splitFrontmatter(content: string): { header: Header; body: string } {
  const text = decode(content);
  if (!text.startsWith("---")) {
    throw new MalformedHeaderError("Missing YAML frontmatter (expected leading ---)");
  }

  const lines = text.split("\n");
  if (lines[0]?.trim() !== "---") {
    throw new MalformedHeaderError("Invalid frontmatter start marker");
  }

  let endIndex = -1;
  for (let i = 1; i < lines.length; i += 1) {
    if (lines[i]?.trim() === "---") {
      endIndex = i;
      break;
    }
  }
  if (endIndex < 0) throw new MalformedHeaderError("Invalid frontmatter: missing closing ---");

  const yamlText = lines.slice(1, endIndex).join("\n");
  let parsed: unknown;
  try {
    // Failsafe keeps every scalar a string, so `007` stays "007".
    parsed = YAML.parse(yamlText, { schema: "failsafe" });
  } catch (err) {
    const msg = err instanceof Error ? err.message : "unknown error";
    throw new MalformedHeaderError(`Invalid frontmatter YAML: ${msg}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new MalformedHeaderError("Invalid frontmatter: expected a YAML mapping/object");
  }

  const header: Header = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || value === undefined || isString(value)) {
      header[key] = value ?? null;
      continue;
    }
    if (Array.isArray(value) && value.every(isString)) {
      header[key] = value;
      continue;
    }
    throw new MalformedHeaderError(
      `Invalid frontmatter: "${key}" must be a scalar or a list of scalars`
    );
  }

  const body = lines.slice(endIndex + 1).join("\n").replace(/^\n+/, "");
  return { header, body };
}

function readString(header: Header, key: string): string {
  const value = header[key];
  if (value === null || value === undefined || Array.isArray(value)) return "";
  return value.trim();
}

function readList(header: Header, key: string, opts: { lowercase: boolean }): string[] {
  const value = header[key];
  if (value === null || value === undefined) return [];
  const items = Array.isArray(value) ? value : value.split(",");

  const out: string[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    const trimmed = item.trim();
    const normalized = opts.lowercase ? trimmed.toLowerCase() : trimmed;
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    out.push(normalized);
  }
  return out;
}

function normalizeResourceRef(ref: string): string {
  return path.posix.normalize(ref.replace(/\\/g, "/")).replace(/^(\.\/)+/, "");
}

export function inferDescriptorKind(sourcePath: string): DescriptorKind {
  return path.basename(sourcePath).endsWith(AGENT_FILE_SUFFIX) ? "agent" : "skill";
}

function buildDescriptor(
  input: string | Uint8Array,
  sourcePath: string,
  options: ParseDescriptorOptions
): Descriptor {
  const { header, body } = splitFrontmatter(decode(input));

  const name = readString(header, "name");
  if (!name) throw new MissingFieldError("name");
  const description = readString(header, "description");
  if (!description) throw new MissingFieldError("description");

  if (!NAME_PATTERN.test(name)) {
    throw new InvalidNameError(
      `Frontmatter.name "${name}" must contain only lowercase letters, numbers, and hyphens, and must not start with a hyphen`
    );
  }

  const kind = options.kind ?? inferDescriptorKind(sourcePath);
  const categories = readList(header, "categories", { lowercase: true });
  const lastModified = options.lastModified ?? 0;

  if (kind === "agent") {
    const agent: AgentDescriptor = {
      kind: "agent",
      name,
      description,
      declaredCategories: categories,
      body,
      sourcePath,
      lastModified,
    };
    return agent;
  }

  if (categories.length === 0) {
    throw new EmptyCategoriesError(
      `Skill "${name}" declares no categories (add a "categories" list to the frontmatter)`
    );
  }

  const skill: SkillDescriptor = {
    kind: "skill",
    name,
    description,
    categories,
    languages: readList(header, "languages", { lowercase: true }),
    resourceRefs: readList(header, "resources", { lowercase: false })
      .map(normalizeResourceRef)
      .filter((ref) => ref && ref !== "."),
    body,
    sourcePath,
    lastModified,
  };
  return skill;
}

export function parseDescriptor(
  input: string | Uint8Array,
  sourcePath: string,
  options: ParseDescriptorOptions = {}
): ParseDescriptorResult {
  try {
    return { ok: true, descriptor: buildDescriptor(input, sourcePath, options) };
  } catch (err) {
    if (err instanceof DescriptorError) return { ok: false, error: err };
    const msg = err instanceof Error ? err.message : "unknown error";
    return { ok: false, error: new MalformedHeaderError(msg) };
  }
}

export function serializeDescriptorHeader(descriptor: Descriptor): string {
  const header: Record<string, string | string[]> = {
    name: descriptor.name,
    description: descriptor.description,
  };
  if (descriptor.kind === "skill") {
    header.categories = [...descriptor.categories];
    header.languages = [...descriptor.languages];
    if (descriptor.resourceRefs.length > 0) header.resources = [...descriptor.resourceRefs];
  } else if (descriptor.declaredCategories.length > 0) {
    header.categories = [...descriptor.declaredCategories];
  }
  return `---\n${YAML.stringify(header)}---\n`;
}
