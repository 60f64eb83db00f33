import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, test } from "node:test";
import { RootUnreadableError } from "../src/server/skills/errors";
import { scanTree } from "../src/server/skills/scanner";

const tempDirs: string[] = [];

function makeTempDir(prefix: string) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function writeFile(filePath: string, content: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

function skillMd(name: string, extra = "categories: [test-framework]") {
  return `---\nname: ${name}\ndescription: ${name} skill\n${extra}\n---\n\n# ${name}\n`;
}

function buildFixtureTree() {
  const root = makeTempDir("skill-index-scan-");
  writeFile(
    path.join(root, "agents", "test-writer.agent.md"),
    "---\nname: test-writer\ndescription: Writes tests\ncategories: [test-framework, mocking]\n---\n"
  );
  writeFile(path.join(root, "agents", "notes.md"), "not an agent");
  writeFile(
    path.join(root, "skills", "junit5", "SKILL.md"),
    skillMd("junit5", "categories: [test-framework]\nlanguages: [java]")
  );
  writeFile(
    path.join(root, "skills", "pytest", "SKILL.md"),
    skillMd("pytest", "categories: [test-framework]\nlanguages: [python]")
  );
  writeFile(path.join(root, "skills", "pytest", "resources", "markers.md"), "markers");
  writeFile(path.join(root, "skills", "pytest", "resources", "fixtures.md"), "fixtures");
  writeFile(path.join(root, "skills", "pytest", "resources", "nested", "SKILL.md"), skillMd("nested"));
  writeFile(path.join(root, "skills", "foo", "SKILL.md"), skillMd("bar"));
  fs.mkdirSync(path.join(root, "skills", "empty-dir"), { recursive: true });
  writeFile(path.join(root, "skills", "lower", "skill.md"), skillMd("lower"));
  writeFile(path.join(root, "skills", ".hidden", "SKILL.md"), skillMd("hidden"));
  return root;
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

test("scans agents and skills in path order", async () => {
  const root = buildFixtureTree();
  const res = await scanTree(root);

  assert.equal(res.root, root);
  assert.deepEqual(
    res.descriptors.map((d) => `${d.kind}:${d.name}`),
    ["agent:test-writer", "skill:junit5", "skill:pytest"]
  );
  assert.deepEqual(res.warnings, []);

  const agent = res.descriptors[0];
  assert.ok(agent && agent.kind === "agent");
  assert.deepEqual(agent.declaredCategories, ["test-framework", "mocking"]);
  assert.equal(agent.sourcePath, path.join(root, "agents", "test-writer.agent.md"));

  const pytest = res.descriptors[2];
  assert.ok(pytest && pytest.kind === "skill");
  assert.deepEqual(pytest.resourceRefs, ["resources/fixtures.md", "resources/markers.md"]);
  assert.ok(pytest.lastModified > 0);
});

test("records per-file errors without aborting the scan", async () => {
  const root = buildFixtureTree();
  const res = await scanTree(root);

  assert.deepEqual(
    res.errors.map((e) => [path.relative(root, e.path), e.code]),
    [
      [path.join("skills", "empty-dir", "SKILL.md"), "MissingDescriptorError"],
      [path.join("skills", "foo", "SKILL.md"), "NameMismatchError"],
      [path.join("skills", "lower", "SKILL.md"), "MissingDescriptorError"],
    ]
  );
  assert.match(res.errors[1]?.message ?? "", /expected "foo", got "bar"/);
});

test("rejects agents whose declared name differs from the file name", async () => {
  const root = makeTempDir("skill-index-scan-agent-");
  writeFile(
    path.join(root, "agents", "planner.agent.md"),
    "---\nname: reviewer\ndescription: Reviews\n---\n"
  );
  fs.mkdirSync(path.join(root, "skills"));

  const res = await scanTree(root);
  assert.deepEqual(res.descriptors, []);
  assert.equal(res.errors.length, 1);
  assert.equal(res.errors[0]?.code, "NameMismatchError");
});

test("indexes a skill whose directory name looks like a number", async () => {
  const root = makeTempDir("skill-index-scan-numeric-");
  fs.mkdirSync(path.join(root, "agents"));
  writeFile(path.join(root, "skills", "007", "SKILL.md"), skillMd("007"));

  const res = await scanTree(root);
  assert.deepEqual(res.errors, []);
  assert.deepEqual(
    res.descriptors.map((d) => d.name),
    ["007"]
  );
});

test("scanning an unchanged tree twice gives equal results", async () => {
  const root = buildFixtureTree();
  const first = await scanTree(root);
  const second = await scanTree(root);
  assert.deepEqual(second, first);
});

test("keeps declared resources instead of listing resources/", async () => {
  const root = makeTempDir("skill-index-scan-res-");
  writeFile(
    path.join(root, "skills", "pact", "SKILL.md"),
    skillMd("pact", "categories: [contract-testing]\nresources: [resources/b.md]")
  );
  writeFile(path.join(root, "skills", "pact", "resources", "a.md"), "a");
  writeFile(path.join(root, "skills", "pact", "resources", "b.md"), "b");

  const res = await scanTree(root);
  const pact = res.descriptors[0];
  assert.ok(pact && pact.kind === "skill");
  assert.deepEqual(pact.resourceRefs, ["resources/b.md"]);
});

test("warns about missing agents/ and skills/ directories", async () => {
  const root = makeTempDir("skill-index-scan-empty-");
  const res = await scanTree(root);

  assert.deepEqual(res.descriptors, []);
  assert.deepEqual(res.errors, []);
  assert.deepEqual(res.warnings, [
    `Agents directory missing: ${path.join(root, "agents")}`,
    `Skills directory missing: ${path.join(root, "skills")}`,
  ]);
});

test("records oversized descriptors", async () => {
  const root = makeTempDir("skill-index-scan-large-");
  writeFile(
    path.join(root, "skills", "big", "SKILL.md"),
    `${skillMd("big")}\n${"x".repeat(2_000)}\n`
  );

  const res = await scanTree(root, { maxDescriptorBytes: 1_000 });
  assert.deepEqual(res.descriptors, []);
  assert.equal(res.errors[0]?.code, "DescriptorTooLargeError");
});

test("throws RootUnreadableError when the root is missing or not a directory", async () => {
  const base = makeTempDir("skill-index-scan-root-");
  await assert.rejects(scanTree(path.join(base, "missing")), RootUnreadableError);

  const filePath = path.join(base, "file.txt");
  fs.writeFileSync(filePath, "x", "utf8");
  await assert.rejects(scanTree(filePath), RootUnreadableError);
});
