import fs from "node:fs";
import path from "node:path";
import { ResourceAccessError } from "./errors";

export type SkillResource = {
  path: string;
  text: string;
  truncated: boolean;
  removedBytes: number;
};

export const TRUNCATION_MARKER = "SKILL_INDEX_TRUNCATED";

/** Largest end offset at or below `end` that does not split a UTF-8 sequence. */
function utf8Boundary(buffer: Buffer, end: number): number {
  let lead = end - 1;
  while (lead > 0 && end - lead < 4 && ((buffer[lead] ?? 0) & 0xc0) === 0x80) lead -= 1;
  if (lead < 0) return end;

  const byte = buffer[lead] ?? 0;
  const width = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
  return lead + width > end ? lead : end;
}

function readUtf8WithSoftByteLimit(input: {
  filePath: string;
  maxBytes: number;
}): { text: string; truncated: boolean; removedBytes: number } {
  const stat = fs.statSync(input.filePath);
  if (!stat.isFile()) throw new ResourceAccessError("Not a file.");

  const maxBytes = Math.max(1, Math.floor(input.maxBytes));
  const totalBytes = stat.size;
  const truncated = totalBytes > maxBytes;
  const toRead = truncated ? maxBytes : totalBytes;

  if (toRead <= 0) return { text: "", truncated, removedBytes: totalBytes };

  const fd = fs.openSync(input.filePath, "r");
  try {
    const buffer = Buffer.allocUnsafe(toRead);
    const bytesRead = fs.readSync(fd, buffer, 0, toRead, 0);
    const end = truncated ? utf8Boundary(buffer, bytesRead) : bytesRead;
    return {
      text: buffer.subarray(0, end).toString("utf8"),
      truncated,
      removedBytes: Math.max(0, totalBytes - end),
    };
  } finally {
    fs.closeSync(fd);
  }
}

export function resolveSkillResourcePath(input: {
  skillDir: string;
  relativePath: string;
}): { rel: string; fullPath: string } {
  const raw = String(input.relativePath ?? "").trim();
  if (!raw) throw new ResourceAccessError("Missing resource path.");

  const relPosix = raw.replace(/\\/g, "/");
  if (path.posix.isAbsolute(relPosix) || path.win32.isAbsolute(relPosix)) {
    throw new ResourceAccessError("Absolute paths are not allowed.");
  }

  const normalized = path.posix.normalize(relPosix).replace(/^(\.\/)+/, "");
  if (!normalized || normalized === ".") {
    throw new ResourceAccessError("Invalid resource path.");
  }
  if (normalized === ".." || normalized.startsWith("../") || normalized.includes("/../")) {
    throw new ResourceAccessError("Path traversal is not allowed.");
  }

  const candidate = path.join(input.skillDir, ...normalized.split("/"));

  let skillReal: string;
  let fileReal: string;
  try {
    skillReal = fs.realpathSync(input.skillDir);
    fileReal = fs.realpathSync(candidate);
  } catch (err) {
    const code = err && typeof err === "object" && "code" in err ? err.code : null;
    if (code === "ENOENT") throw new ResourceAccessError("Resource not found.");
    throw new ResourceAccessError("Unable to read resource.");
  }

  const prefix = skillReal.endsWith(path.sep) ? skillReal : `${skillReal}${path.sep}`;
  if (!fileReal.startsWith(prefix)) {
    throw new ResourceAccessError("Access denied.");
  }

  return { rel: normalized, fullPath: candidate };
}

export function readSkillResource(input: {
  skillDir: string;
  relativePath: string;
  maxBytes: number;
}): SkillResource {
  const { rel, fullPath } = resolveSkillResourcePath(input);
  const read = readUtf8WithSoftByteLimit({ filePath: fullPath, maxBytes: input.maxBytes });
  const text =
    read.removedBytes > 0
      ? `${read.text}\n\n[${TRUNCATION_MARKER}: resource; ${read.removedBytes} bytes removed]`
      : read.text;
  return { path: rel, text, truncated: read.truncated, removedBytes: read.removedBytes };
}
