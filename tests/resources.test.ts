import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, test } from "node:test";
import { ResourceAccessError } from "../src/server/skills/errors";
import { readSkillResource, resolveSkillResourcePath } from "../src/server/skills/resources";

const tempDirs: string[] = [];

function makeTempDir(prefix: string) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    try {
      fs.rmSync(dir, { recursive: true, force: true });
    } catch {
      // ignore
    }
  }
});

function makeSkillDir() {
  const base = makeTempDir("skill-index-resources-");
  const skillDir = path.join(base, "skills", "pytest");
  fs.mkdirSync(path.join(skillDir, "resources"), { recursive: true });
  fs.writeFileSync(path.join(skillDir, "resources", "fixtures.md"), "0123456789abcdef", "utf8");
  fs.writeFileSync(path.join(base, "outside.md"), "outside", "utf8");
  return { base, skillDir };
}

test("truncates large resources and appends a notice", () => {
  const { skillDir } = makeSkillDir();
  const res = readSkillResource({
    skillDir,
    relativePath: "./resources/fixtures.md",
    maxBytes: 10,
  });

  assert.deepEqual(res, {
    path: "resources/fixtures.md",
    text: "0123456789\n\n[SKILL_INDEX_TRUNCATED: resource; 6 bytes removed]",
    truncated: true,
    removedBytes: 6,
  });
});

test("rejects traversal, absolute paths and symlink escapes", () => {
  const { base, skillDir } = makeSkillDir();
  fs.symlinkSync(path.join(base, "outside.md"), path.join(skillDir, "resources", "escape.md"));

  const cases: [string, RegExp][] = [
    ["", /Missing resource path/],
    [".", /Invalid resource path/],
    ["../../outside.md", /Path traversal/],
    ["resources/../../../outside.md", /Path traversal/],
    [path.join(base, "outside.md"), /Absolute paths/],
    ["resources/escape.md", /Access denied/],
    ["resources/missing.md", /Resource not found/],
  ];

  for (const [relativePath, message] of cases) {
    assert.throws(
      () => resolveSkillResourcePath({ skillDir, relativePath }),
      (err: unknown) => err instanceof ResourceAccessError && message.test(err.message),
      relativePath
    );
  }
});

test("directories are not readable as resources", () => {
  const { skillDir } = makeSkillDir();
  assert.throws(
    () => readSkillResource({ skillDir, relativePath: "resources", maxBytes: 100 }),
    /Not a file/
  );
});

test("truncation never splits a multi-byte character", () => {
  const { skillDir } = makeSkillDir();
  fs.writeFileSync(path.join(skillDir, "resources", "prices.md"), "ab€cd", "utf8");

  const res = readSkillResource({ skillDir, relativePath: "resources/prices.md", maxBytes: 3 });

  assert.deepEqual(res, {
    path: "resources/prices.md",
    text: "ab\n\n[SKILL_INDEX_TRUNCATED: resource; 5 bytes removed]",
    truncated: true,
    removedBytes: 5,
  });
});

test("a skill directory removed after indexing is reported as a resource error", () => {
  const { skillDir } = makeSkillDir();
  fs.rmSync(skillDir, { recursive: true, force: true });

  assert.throws(
    () => readSkillResource({ skillDir, relativePath: "resources/fixtures.md", maxBytes: 100 }),
    (err: unknown) => err instanceof ResourceAccessError && err.message === "Resource not found."
  );
});
