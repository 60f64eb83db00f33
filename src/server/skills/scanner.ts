import type { Dirent } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import {
  DescriptorTooLargeError,
  MissingDescriptorError,
  NameMismatchError,
  RootUnreadableError,
  UnreadableFileError,
} from "./errors";
import { AGENT_FILE_SUFFIX, SKILL_FILE_NAME, parseDescriptor } from "./skill-md";
import type { Descriptor, DescriptorKind, ScanFileError, ScanResult } from "./types";

export const AGENTS_DIR = "agents";
export const SKILLS_DIR = "skills";
export const RESOURCES_DIR = "resources";

export type ScanOptions = {
  maxDescriptorBytes?: number;
};

type LoadOutcome = { descriptor: Descriptor } | { error: ScanFileError };

type DescriptorTarget = {
  filePath: string;
  kind: DescriptorKind;
  expectedName: string;
  skillDir?: string;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "unknown error";
}

function errorCode(err: unknown): string | null {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

function byPath(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function normalizeRoot(rootPath: string): string {
  const resolved = path.resolve(String(rootPath ?? ""));
  return resolved.length > 1 ? resolved.replace(/\/+$/, "") : resolved;
}

async function entryIs(
  dir: string,
  entry: Dirent,
  want: "file" | "directory"
): Promise<boolean> {
  if (want === "file" ? entry.isFile() : entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    const stat = await fsp.stat(path.join(dir, entry.name));
    return want === "file" ? stat.isFile() : stat.isDirectory();
  } catch {
    return false;
  }
}

async function listResourceFiles(skillDir: string): Promise<string[]> {
  const resourcesDir = path.join(skillDir, RESOURCES_DIR);
  let entries: Dirent[];
  try {
    entries = await fsp.readdir(resourcesDir, { withFileTypes: true });
  } catch {
    return [];
  }

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    if (await entryIs(resourcesDir, entry, "file")) {
      files.push(`${RESOURCES_DIR}/${entry.name}`);
    }
  }
  return files.sort(byPath);
}

async function loadDescriptor(
  target: DescriptorTarget,
  maxBytes: number
): Promise<LoadOutcome> {
  const { filePath } = target;

  let content: Buffer;
  let lastModified: number;
  try {
    const stat = await fsp.stat(filePath);
    if (stat.size > maxBytes) {
      return {
        error: new DescriptorTooLargeError(
          `Descriptor is ${stat.size} bytes (limit ${maxBytes})`
        ).toScanError(filePath),
      };
    }
    lastModified = stat.mtimeMs;
    content = await fsp.readFile(filePath);
  } catch (err) {
    return {
      error: new UnreadableFileError(
        `Unable to read descriptor (${errorMessage(err)})`
      ).toScanError(filePath),
    };
  }

  const parsed = parseDescriptor(content, filePath, { kind: target.kind, lastModified });
  if (!parsed.ok) return { error: parsed.error.toScanError(filePath) };

  const descriptor = parsed.descriptor;
  if (descriptor.name !== target.expectedName) {
    return {
      error: new NameMismatchError(target.expectedName, descriptor.name).toScanError(filePath),
    };
  }

  if (descriptor.kind === "skill" && target.skillDir && descriptor.resourceRefs.length === 0) {
    const resourceRefs = await listResourceFiles(target.skillDir);
    if (resourceRefs.length > 0) return { descriptor: { ...descriptor, resourceRefs } };
  }

  return { descriptor };
}

async function readDirOrRecord(
  dir: string,
  label: string,
  errors: ScanFileError[],
  warnings: string[]
): Promise<Dirent[] | null> {
  try {
    return await fsp.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      warnings.push(`${label} directory missing: ${dir}`);
    } else {
      errors.push(
        new UnreadableFileError(
          `Unable to read ${label.toLowerCase()} directory (${errorMessage(err)})`
        ).toScanError(dir)
      );
    }
    return null;
  }
}

async function collectAgentTargets(
  root: string,
  errors: ScanFileError[],
  warnings: string[]
): Promise<DescriptorTarget[]> {
  const agentsDir = path.join(root, AGENTS_DIR);
  const entries = await readDirOrRecord(agentsDir, "Agents", errors, warnings);
  if (!entries) return [];

  const targets: DescriptorTarget[] = [];
  for (const entry of entries) {
    if (!entry.name.endsWith(AGENT_FILE_SUFFIX)) continue;
    if (!(await entryIs(agentsDir, entry, "file"))) continue;
    targets.push({
      filePath: path.join(agentsDir, entry.name),
      kind: "agent",
      expectedName: entry.name.slice(0, -AGENT_FILE_SUFFIX.length),
    });
  }
  return targets;
}

async function collectSkillTargets(
  root: string,
  errors: ScanFileError[],
  warnings: string[]
): Promise<DescriptorTarget[]> {
  const skillsDir = path.join(root, SKILLS_DIR);
  const entries = await readDirOrRecord(skillsDir, "Skills", errors, warnings);
  if (!entries) return [];

  const targets: DescriptorTarget[] = [];
  for (const entry of entries) {
    if (!entry.name || entry.name.startsWith(".")) continue;
    if (!(await entryIs(skillsDir, entry, "directory"))) continue;

    const skillDir = path.join(skillsDir, entry.name);
    const skillMdPath = path.join(skillDir, SKILL_FILE_NAME);

    let children: Dirent[];
    try {
      children = await fsp.readdir(skillDir, { withFileTypes: true });
    } catch (err) {
      errors.push(
        new UnreadableFileError(
          `Unable to read skill directory (${errorMessage(err)})`
        ).toScanError(skillDir)
      );
      continue;
    }

    // Exact, case-sensitive match against the listing.
    const descriptorEntry = children.find((child) => child.name === SKILL_FILE_NAME);
    if (!descriptorEntry || !(await entryIs(skillDir, descriptorEntry, "file"))) {
      errors.push(
        new MissingDescriptorError(`Skill directory has no ${SKILL_FILE_NAME}`).toScanError(
          skillMdPath
        )
      );
      continue;
    }

    targets.push({ filePath: skillMdPath, kind: "skill", expectedName: entry.name, skillDir });
  }
  return targets;
}

/**
 * Scans `<root>/agents/*.agent.md` and `<root>/skills/<name>/SKILL.md`.
 * Per-file failures are returned in `errors`; only an unreadable root throws.
 */
export async function scanTree(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const root = normalizeRoot(rootPath);
  const maxBytes = Math.max(1, Math.floor(Number(options.maxDescriptorBytes ?? 200_000)));

  try {
    const stat = await fsp.stat(root);
    if (!stat.isDirectory()) throw new Error("not a directory");
    await fsp.access(root, fsp.constants.R_OK | fsp.constants.X_OK);
  } catch (err) {
    throw new RootUnreadableError(`Skills root unreadable: ${root} (${errorMessage(err)})`);
  }

  const errors: ScanFileError[] = [];
  const warnings: string[] = [];

  const [agentTargets, skillTargets] = await Promise.all([
    collectAgentTargets(root, errors, warnings),
    collectSkillTargets(root, errors, warnings),
  ]);

  const outcomes = await Promise.all(
    [...agentTargets, ...skillTargets].map((target) => loadDescriptor(target, maxBytes))
  );

  const descriptors: Descriptor[] = [];
  for (const outcome of outcomes) {
    if ("descriptor" in outcome) descriptors.push(outcome.descriptor);
    else errors.push(outcome.error);
  }

  descriptors.sort((a, b) => byPath(a.sourcePath, b.sourcePath));
  errors.sort((a, b) => byPath(a.path, b.path));
  warnings.sort(byPath);

  return { root, descriptors, errors, warnings };
}
