import os from "node:os";
import path from "node:path";
import type { RegistrySnapshot } from "./types";

const REDACTED = "<redacted>";

export type PublicSkillSummary = {
  name: string;
  description: string;
  categories: string[];
  languages: string[];
  resourceRefs: string[];
  sourcePath: string;
};

export type PublicRegistrySummary = {
  generation: number;
  builtAt: number;
  roots: string[];
  skills: PublicSkillSummary[];
  agents: { name: string; description: string; declaredCategories: string[]; sourcePath: string }[];
  errors: { path: string; code: string; message: string }[];
  duplicates: { name: string; descriptorKind: string; keptPath: string; duplicatePath: string }[];
  warnings: string[];
};

function normalizeAbsolute(p: string): string {
  const resolved = path.resolve(String(p ?? ""));
  return isFilesystemRoot(resolved) ? resolved : resolved.replace(/[\\/]+$/, "");
}

// The filesystem root is never used as a rewrite base.
function isFilesystemRoot(p: string): boolean {
  return !p || path.parse(p).root === p;
}

function toPosix(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Rewrites an absolute path relative to the working directory (`./…`) or the
 * home directory (`~/…`). Anything else becomes `<redacted>`.
 */
export function redactPath(
  p: string,
  cwdAbs: string = normalizeAbsolute(process.cwd()),
  homeAbs: string = normalizeAbsolute(os.homedir())
): string {
  if (!String(p ?? "").trim()) return REDACTED;
  const abs = normalizeAbsolute(p);

  if (!isFilesystemRoot(cwdAbs)) {
    if (abs === cwdAbs) return ".";
    if (abs.startsWith(`${cwdAbs}${path.sep}`)) {
      return `./${toPosix(path.relative(cwdAbs, abs))}`;
    }
  }

  if (!isFilesystemRoot(homeAbs)) {
    if (abs === homeAbs) return "~";
    if (abs.startsWith(`${homeAbs}${path.sep}`)) {
      return `~/${toPosix(path.relative(homeAbs, abs))}`;
    }
  }

  return REDACTED;
}

export function sanitizeText(input: string, cwdAbs: string, homeAbs: string): string {
  let text = String(input ?? "");
  if (!text) return "";

  if (!isFilesystemRoot(cwdAbs)) text = text.replaceAll(cwdAbs, ".");
  if (!isFilesystemRoot(homeAbs)) text = text.replaceAll(homeAbs, "~");

  // Last resort: redact any remaining absolute-looking paths.
  text = text.replace(/(^|[\s(])\/[^\s)]+/g, `$1${REDACTED}`);
  text = text.replace(/(^|[\s(])[A-Za-z]:\\\\[^\s)]+/g, `$1${REDACTED}`);

  return text;
}

export function redactSnapshotForPublic(snapshot: RegistrySnapshot): PublicRegistrySummary {
  const cwdAbs = normalizeAbsolute(process.cwd());
  const homeAbs = normalizeAbsolute(os.homedir());
  const redact = (p: string) => redactPath(p, cwdAbs, homeAbs);

  return {
    generation: snapshot.generation,
    builtAt: snapshot.builtAt,
    roots: snapshot.roots.map(redact),
    skills: snapshot.skills.map((s) => ({
      name: s.name,
      description: s.description,
      categories: [...s.categories],
      languages: [...s.languages],
      resourceRefs: [...s.resourceRefs],
      sourcePath: redact(s.sourcePath),
    })),
    agents: snapshot.agents.map((a) => ({
      name: a.name,
      description: a.description,
      declaredCategories: [...a.declaredCategories],
      sourcePath: redact(a.sourcePath),
    })),
    errors: snapshot.errors.map((e) => ({
      path: redact(e.path),
      code: e.code,
      message: sanitizeText(e.message, cwdAbs, homeAbs),
    })),
    duplicates: snapshot.duplicates.map((d) => ({
      name: d.name,
      descriptorKind: d.descriptorKind,
      keptPath: redact(d.keptPath),
      duplicatePath: redact(d.duplicatePath),
    })),
    warnings: snapshot.warnings.map((w) => sanitizeText(w, cwdAbs, homeAbs)).filter(Boolean),
  };
}
