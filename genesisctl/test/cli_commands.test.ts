import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { build } from "../src/commands/build.js";
import { getVersion } from "../src/commands/get-version.js";
import { validateProject } from "../src/commands/validate.js";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { collectingReporter, createReporter, diag } from "../src/reporter.js";
import { COMMIT, FakeBuilder, FakeRepository, makeTmpDir, writeFiles } from "./helpers.js";

const DEMO_CONFIG = `
build:
  deps:
    - dst: /opt/app
      src: ../app
  elements:
    - images:
        - name: demo
          format: raw
          profile: ubuntu_24
`;

const NOW = () => new Date("2024-05-06T07:08:09Z");

function taggedRepo(tag = "0.1.0"): FakeRepository {
  return new FakeRepository({ tag, exact: true }, { commit: COMMIT, dirty: false, branch: "main" });
}

describe("build command", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir("cli");
    writeFiles(root, {
      "genesis/genesis.yaml": DEMO_CONFIG,
      "app/main.py": "print('hello')\n",
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("builds a tagged project end to end", async () => {
    const reporter = collectingReporter();
    const builder = new FakeBuilder();
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, reporter, env: {} });

    expect(res).toMatchObject({ ok: true, version: "0.1.0", outputRoot: path.join(root, "output") });
    expect(fs.readFileSync(path.join(root, "output/0/demo.raw"), "utf8")).toBe("image:demo");
    expect(fs.readFileSync(path.join(root, ".genesis/stage/opt/app/main.py"), "utf8")).toBe("print('hello')\n");
    expect(builder.calls[0].version).toBe("0.1.0");

    const info = JSON.parse(fs.readFileSync(path.join(root, "output/build-info.json"), "utf8"));
    expect(info.version).toBe("0.1.0");
    expect(info.complete).toBe(true);
    expect(info.elements[0].images[0].file).toBe("0/demo.raw");

    expect(reporter.diagnostics.map((d) => d.code)).toEqual([
      "VERSION",
      "STAGED",
      "UNIT_STARTED",
      "UNIT_BUILT",
      "ELEMENT_COLLECTED",
      "SUMMARY",
      "RUN_COMPLETE",
    ]);
    const summaryLines = reporter.diagnostics.filter((d) => d.code === "SUMMARY" || d.code === "RUN_COMPLETE");
    expect(summaryLines.map((d) => d.message)).toEqual([
      "built     0/demo  output/0/demo.raw",
      "built=1 skipped=0 failed=0 cancelled=0",
    ]);
  });

  it("skips the image on a second run", async () => {
    await build({ projectRoot: root, repository: taggedRepo(), builder: new FakeBuilder(), env: {} });
    const builder = new FakeBuilder();
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, env: {} });

    expect(builder.calls).toHaveLength(0);
    expect(res.ok && res.summary?.counts).toEqual({ built: 0, skipped: 1, failed: 0, cancelled: 0 });
  });

  it("versions untagged work as dev", async () => {
    const repo = new FakeRepository({ tag: "0.1.0", exact: false }, { commit: COMMIT, dirty: false, branch: "main" });
    const res = await build({ projectRoot: root, repository: repo, now: NOW, builder: new FakeBuilder(), env: {} });
    expect(res).toMatchObject({ ok: true, version: "0.1.0-dev+20240506070809.01234567" });
  });

  it("prints the plan on a dry run without staging or building", async () => {
    const reporter = collectingReporter();
    const builder = new FakeBuilder();
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, reporter, dryRun: true, env: {} });

    expect(res).toEqual({
      ok: true,
      version: "0.1.0",
      outputRoot: path.join(root, "output"),
      summary: null,
      buildInfoPath: null,
    });
    expect(builder.calls).toHaveLength(0);
    expect(fs.existsSync(path.join(root, ".genesis"))).toBe(false);
    expect(reporter.diagnostics.filter((d) => d.code === "PLAN_UNIT").map((d) => d.message)).toEqual([
      "0/demo -> output/0/demo.raw",
    ]);
  });

  it("reports a failed image as BUILD_FAILED", async () => {
    const builder = new FakeBuilder(() => ({ exitCode: 1, signal: null, timedOut: false, output: "" }));
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, env: {} });

    expect(res).toMatchObject({ ok: false, error: { code: "BUILD_FAILED", message: "1 image(s) failed, 0 cancelled" } });
    expect(fs.existsSync(path.join(root, "output/0/demo.raw"))).toBe(false);
  });

  it("reports an aborted run as CANCELLED", async () => {
    const controller = new AbortController();
    controller.abort();
    const builder = new FakeBuilder();
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, signal: controller.signal, env: {} });

    expect(builder.calls).toHaveLength(0);
    expect(res).toMatchObject({ ok: false, error: { code: "CANCELLED", message: "Build cancelled (1 image(s) cancelled)" } });
  });

  it("fails before building when the config is missing", async () => {
    fs.rmSync(path.join(root, "genesis/genesis.yaml"));
    const builder = new FakeBuilder();
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, env: {} });

    expect(res).toMatchObject({ ok: false, error: { code: "CONFIG_NOT_FOUND" } });
    expect(builder.calls).toHaveLength(0);
  });

  it("fails before building when a dependency is missing", async () => {
    fs.rmSync(path.join(root, "app"), { recursive: true });
    const builder = new FakeBuilder();
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder, env: {} });

    expect(res).toMatchObject({ ok: false, error: { code: "DEPENDENCY_MISSING" } });
    expect(builder.calls).toHaveLength(0);
  });

  it("fails before building when the developer key is missing", async () => {
    const builder = new FakeBuilder();
    const res = await build({
      projectRoot: root,
      repository: taggedRepo(),
      builder,
      devKeyPath: path.join(root, "id.pub"),
      env: {},
    });
    expect(res).toMatchObject({ ok: false, error: { code: "INPUT_MISSING" } });
  });

  it("passes the developer key to the builder", async () => {
    const keyPath = path.join(root, "id.pub");
    fs.writeFileSync(keyPath, "ssh-ed25519 AAAA test\n");
    const builder = new FakeBuilder();
    await build({ projectRoot: root, repository: taggedRepo(), builder, devKeyPath: keyPath, env: {} });
    expect(builder.calls[0].devKeyPath).toBe(keyPath);
  });

  it("rejects an invalid job count", async () => {
    const res = await build({ projectRoot: root, repository: taggedRepo(), jobs: 0, builder: new FakeBuilder(), env: {} });
    expect(res).toMatchObject({ ok: false, error: { code: "SETTINGS_INVALID" } });
  });

  it("builds a project that stages itself as a dependency", async () => {
    writeFiles(root, {
      "genesis/genesis.yaml": `
build:
  deps:
    - dst: /opt/app
      path:
        src: ..
  elements:
    - images:
        - { name: demo, format: raw, profile: ubuntu_24 }
`,
    });
    const first = await build({ projectRoot: root, repository: taggedRepo(), builder: new FakeBuilder(), env: {} });
    expect(first).toMatchObject({ ok: true });

    const reporter = collectingReporter();
    const second = await build({ projectRoot: root, repository: taggedRepo(), builder: new FakeBuilder(), reporter, force: true, env: {} });
    expect(second).toMatchObject({ ok: true, version: "0.1.0" });
    expect(fs.readFileSync(path.join(root, "output/0/demo.raw"), "utf8")).toBe("image:demo");
    expect(fs.readdirSync(path.join(root, ".genesis/stage/opt/app")).sort()).toEqual(["app", "genesis"]);
    expect(reporter.diagnostics.find((d) => d.code === "STAGE_EXCLUDED")?.message).toBe(
      "Dependency '/opt/app' contains .genesis, output; not staged",
    );
  });

  it("honours output_dir from project settings", async () => {
    writeFiles(root, { "genesis/settings.yaml": "output_dir: images\n" });
    const res = await build({ projectRoot: root, repository: taggedRepo(), builder: new FakeBuilder(), env: {} });
    expect(res).toMatchObject({ ok: true, outputRoot: path.join(root, "images") });
    expect(fs.existsSync(path.join(root, "images/0/demo.raw"))).toBe(true);
  });
});

describe("get-version command", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir("version");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("returns the stable version", async () => {
    await expect(getVersion({ projectRoot: root, repository: taggedRepo("1.2.3"), env: {} })).resolves.toEqual({
      ok: true,
      version: "1.2.3",
    });
  });

  it("uses release branches from project settings", async () => {
    writeFiles(root, { "genesis/settings.yaml": "release_branches: ['release/*']\n" });
    const repo = new FakeRepository({ tag: "1.2.3", exact: false }, { commit: COMMIT, dirty: false, branch: "release/1.3" });
    await expect(getVersion({ projectRoot: root, repository: repo, now: NOW, env: {} })).resolves.toEqual({
      ok: true,
      version: "1.2.3-rc+20240506070809.01234567",
    });
  });

  it("fails for a missing project root", async () => {
    const res = await getVersion({ projectRoot: path.join(root, "nope"), env: {} });
    expect(res).toMatchObject({ ok: false, error: { code: "VERSION_UNDETERMINED" } });
  });

  it("fails for a repository without commits", async () => {
    const res = await getVersion({ projectRoot: root, repository: new FakeRepository(null, null), env: {} });
    expect(res).toMatchObject({ ok: false, error: { code: "VERSION_UNDETERMINED" } });
  });
});

describe("validate command", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir("validate");
    writeFiles(root, { "genesis/genesis.yaml": DEMO_CONFIG, "app/main.py": "" });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("summarises a valid project", () => {
    const res = validateProject({ projectRoot: root, env: {} });
    expect(res).toEqual({
      ok: true,
      units: ["0/demo"],
      diagnostics: [
        {
          level: "info",
          code: "CONFIG_OK",
          message: `${path.join(root, "genesis", "genesis.yaml")}: 1 element(s), 1 image(s), 1 dependencies`,
          path: path.join(root, "genesis", "genesis.yaml"),
        },
      ],
    });
    expect(fs.existsSync(path.join(root, ".genesis"))).toBe(false);
  });

  it("warns that a self-listing project keeps its work and output trees out of the stage", () => {
    writeFiles(root, {
      "genesis/genesis.yaml": "build:\n  deps:\n    - { dst: /opt/app, src: .. }\n  elements:\n    - images:\n        - { name: demo, format: raw, profile: ubuntu_24 }\n",
    });
    const res = validateProject({ projectRoot: root, env: {} });
    expect(res.ok).toBe(true);
    expect(res.ok && res.diagnostics.map((d) => [d.level, d.code, d.message])).toEqual([
      ["info", "CONFIG_OK", `${path.join(root, "genesis", "genesis.yaml")}: 1 element(s), 1 image(s), 1 dependencies`],
      ["warn", "STAGE_EXCLUDED", "Dependency '/opt/app' contains .genesis, output; not staged"],
    ]);
  });

  it("reports the first problem with its code", () => {
    fs.rmSync(path.join(root, "app"), { recursive: true });
    const res = validateProject({ projectRoot: root, env: {} });
    expect(res).toMatchObject({ ok: false, code: "DEPENDENCY_MISSING", errors: [{ level: "error", code: "DEPENDENCY_MISSING" }] });
  });
});

describe("exit codes", () => {
  it("maps error codes to exit statuses", () => {
    expect(exitCodeFor("CONFIG_NOT_FOUND")).toBe(EXIT.CONFIG_ERROR);
    expect(exitCodeFor("CONFIG_MALFORMED")).toBe(EXIT.CONFIG_ERROR);
    expect(exitCodeFor("SETTINGS_INVALID")).toBe(EXIT.CONFIG_ERROR);
    expect(exitCodeFor("DEPENDENCY_MISSING")).toBe(EXIT.INPUT_MISSING);
    expect(exitCodeFor("INPUT_MISSING")).toBe(EXIT.INPUT_MISSING);
    expect(exitCodeFor("STAGING_FAILED")).toBe(EXIT.INPUT_MISSING);
    expect(exitCodeFor("VERSION_UNDETERMINED")).toBe(5);
    expect(exitCodeFor("BUILD_FAILED")).toBe(1);
    expect(exitCodeFor("CANCELLED")).toBe(6);
  });
});

describe("reporter", () => {
  function capture(format: "human" | "jsonl") {
    const out: string[] = [];
    const err: string[] = [];
    const reporter = createReporter(format, { stdout: (l) => out.push(l), stderr: (l) => err.push(l) });
    return { reporter, out, err };
  }

  it("prints messages for humans, problems on stderr", () => {
    const { reporter, out, err } = capture("human");
    reporter.emit(diag("info", "VERSION", "Version 1.0.0"));
    reporter.emit(diag("error", "BUILD_FAILED", "1 image(s) failed"));
    expect(out).toEqual(["Version 1.0.0"]);
    expect(err).toEqual(["error: 1 image(s) failed"]);
  });

  it("prints one JSON object per line", () => {
    const { reporter, out, err } = capture("jsonl");
    reporter.emit(diag("warn", "ELEMENT_EMPTY", "nothing", { element: "0" }));
    expect(err).toEqual([]);
    expect(out.map((l) => JSON.parse(l))).toEqual([
      { element: "0", level: "warn", code: "ELEMENT_EMPTY", message: "nothing" },
    ]);
  });
});
