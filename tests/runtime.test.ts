import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { _resetConfigCacheForTests } from "../src/server/config";
import { _setLogSinkForTests } from "../src/server/log";
import { RootUnreadableError } from "../src/server/skills/errors";
import {
  _resetSkillEngineForTests,
  createSkillEngineFromConfig,
  getSkillEngine,
} from "../src/server/skills/runtime";

const ORIGINAL_CONFIG_PATH = process.env.SKILL_INDEX_CONFIG_PATH;
const tempDirs: string[] = [];

function makeTempDir(prefix: string) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function useConfig(root: string, extra = "") {
  const dir = makeTempDir("skill-index-runtime-config-");
  const configPath = path.join(dir, "skill-index.toml");
  fs.writeFileSync(
    configPath,
    `version = 1\n\n[skills]\nroots = [${JSON.stringify(root)}]\nwatch = false\n${extra}`,
    "utf8"
  );
  process.env.SKILL_INDEX_CONFIG_PATH = configPath;
}

function writeSkill(root: string, name: string) {
  const skillDir = path.join(root, "skills", name);
  fs.mkdirSync(skillDir, { recursive: true });
  fs.writeFileSync(
    path.join(skillDir, "SKILL.md"),
    `---\nname: ${name}\ndescription: ${name} skill\ncategories: [mocking]\n---\n`,
    "utf8"
  );
}

beforeEach(() => {
  _setLogSinkForTests(() => undefined);
});

afterEach(async () => {
  await _resetSkillEngineForTests();
  _resetConfigCacheForTests();
  _setLogSinkForTests(null);
  if (ORIGINAL_CONFIG_PATH === undefined) delete process.env.SKILL_INDEX_CONFIG_PATH;
  else process.env.SKILL_INDEX_CONFIG_PATH = ORIGINAL_CONFIG_PATH;
  for (const dir of tempDirs.splice(0)) {
    try {
      fs.rmSync(dir, { recursive: true, force: true });
    } catch {
      // ignore
    }
  }
});

test("getSkillEngine builds one shared engine from the config file", async () => {
  const root = makeTempDir("skill-index-runtime-root-");
  writeSkill(root, "mockk");
  useConfig(root);

  const first = getSkillEngine();
  const second = getSkillEngine();
  assert.equal(first, second);

  const engine = await first;
  assert.deepEqual(engine.roots, [root]);
  assert.equal(engine.watching, false);
  assert.equal(engine.query({ categories: ["mocking"] }).slots[0]?.skill?.name, "mockk");
});

test("a failed start is not cached", async () => {
  const base = makeTempDir("skill-index-runtime-missing-");
  const root = path.join(base, "later");
  useConfig(root);

  await assert.rejects(getSkillEngine(), RootUnreadableError);

  writeSkill(root, "mockk");
  const engine = await getSkillEngine();
  assert.equal(engine.getSkill("mockk")?.name, "mockk");
});

test("overrides take precedence over the config file", async () => {
  const root = makeTempDir("skill-index-runtime-override-");
  const other = makeTempDir("skill-index-runtime-other-");
  writeSkill(other, "sinon");
  useConfig(root, "max_skills = 1\n");

  const engine = await createSkillEngineFromConfig({ roots: [other] });
  try {
    assert.deepEqual(engine.roots, [other]);
    assert.deepEqual(
      engine.listSkills().map((s) => s.name),
      ["sinon"]
    );
  } finally {
    engine.stop();
  }
});
