import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  ResolverArtifactProvisioner,
  artifactPath,
  bufferArtifactSource,
  effectiveConfigDir,
  resolveEffectiveConfig,
  type ResolveEffectiveConfigInput,
} from "../../../src/core/effective-config/index.js";
import { InvalidOutputDirError, InvalidOutputSetError, MissingRuntimeError } from "../../../src/core/errors.js";
import { createTestMessages } from "../../../src/core/messages.js";
import { CannedResolver, EFFECTIVE, LOCAL_ECHO, STATE, makeTempDir, type CannedOutput } from "../../helpers/canned-resolver.js";

describe("resolveEffectiveConfig", () => {
  let projectDir: string;
  let systemDir: string;

  beforeEach(() => {
    projectDir = makeTempDir("project");
    systemDir = makeTempDir("system");
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
    fs.rmSync(systemDir, { recursive: true, force: true });
  });

  function run(outputs: CannedOutput[], overrides: Partial<ResolveEffectiveConfigInput> = {}) {
    const messages = createTestMessages();
    const resolver = new CannedResolver(outputs);
    const deps = {
      resolver,
      messages,
      provisioner: new ResolverArtifactProvisioner(bufferArtifactSource(new Uint8Array([1, 2, 3])), messages),
      platform: "linux" as const,
    };
    const input: ResolveEffectiveConfigInput = {
      projectDir,
      runtimePath: "/opt/jdk/bin/java",
      systemDir,
      effectiveConfigDirName: "effective-config",
      ...overrides,
    };
    return { messages, resolver, result: resolveEffectiveConfig(input, deps) };
  }

  const outputDir = () => effectiveConfigDir(systemDir, "effective-config");

  it("flags an ide declared only in an imported file", async () => {
    fs.writeFileSync(path.join(projectDir, "qodana.yaml"), "ide: QDJVM\n");

    const { result, messages } = run([
      {
        files: {
          [EFFECTIVE]: 'ide: QDPY\nlinter: ""\n',
          [LOCAL_ECHO]: "ide: QDJVM\n",
          [STATE]: "{}",
        },
      },
    ]);
    const resolution = await result;

    expect(resolution.status).toBe("inconsistent");
    if (resolution.status !== "inconsistent") return;
    expect(resolution.error).toMatchObject({ field: "ide", effectiveValue: "QDPY", localValue: "QDJVM" });
    expect(resolution.localConfigPath).toBe("qodana.yaml");
    expect(messages.getMessages("error")).toEqual([
      "'ide: QDPY' is specified in one of the files imported by qodana.yaml; 'ide' is required in the root configuration",
      "Add `ide: QDPY` to qodana.yaml",
    ]);
    expect(messages.getMessages("success")).toEqual([]);
  });

  it("resolves when the outputs agree", async () => {
    fs.writeFileSync(path.join(projectDir, "qodana.yaml"), "linter: jetbrains/qodana-jvm\n");

    const { result, messages } = run([
      {
        files: {
          [EFFECTIVE]: "linter: jetbrains/qodana-jvm\n",
          [LOCAL_ECHO]: "linter: jetbrains/qodana-jvm\n",
          [STATE]: "{}",
        },
      },
    ]);

    expect(await result).toEqual({
      status: "resolved",
      localConfigPath: "qodana.yaml",
      config: {
        configDir: outputDir(),
        effective: {
          path: path.join(outputDir(), EFFECTIVE),
          identity: { ide: "", linter: "jetbrains/qodana-jvm" },
          localEchoPath: path.join(outputDir(), LOCAL_ECHO),
        },
        resolverStatePath: path.join(outputDir(), STATE),
      },
    });
    expect(messages.getMessages("success")).toEqual(["Loaded effective configuration"]);
  });

  it("resolves with only an effective config and a state file", async () => {
    const { result } = run([{ files: { [EFFECTIVE]: "ide: QDPY\n", [STATE]: "{}" } }]);
    const resolution = await result;

    expect(resolution.status).toBe("resolved");
    if (resolution.status !== "resolved") return;
    expect(resolution.config.effective?.localEchoPath).toBeUndefined();
  });

  it("invokes the resolver with the local config and the output directory", async () => {
    fs.writeFileSync(path.join(projectDir, "qodana.yml"), "ide: QDGO\n");

    const { result, resolver } = run([{ files: { [STATE]: "{}" } }], {
      globalConfigsFile: path.join(projectDir, "global.yaml"),
      globalConfigId: "go-default",
    });
    await result;

    expect(resolver.invocations).toEqual([
      {
        cwd: projectDir,
        outputDir: outputDir(),
        args: [
          "/opt/jdk/bin/java",
          "-jar",
          artifactPath(systemDir),
          "--effective-config-out-dir",
          outputDir(),
          "--local-qodana-yaml",
          path.join(projectDir, "qodana.yml"),
          "--global-configs-file",
          path.join(projectDir, "global.yaml"),
          "--global-config-id",
          "go-default",
        ],
      },
    ]);
  });

  it("honours an explicit local config path", async () => {
    fs.mkdirSync(path.join(projectDir, "ci"));
    fs.writeFileSync(path.join(projectDir, "ci", "qodana.yaml"), "ide: QDNET\n");

    const { result, resolver, messages } = run(
      [{ files: { [EFFECTIVE]: "ide: QDNET\nlinter: x\n", [LOCAL_ECHO]: "ide: QDNET\n", [STATE]: "{}" } }],
      { localConfigPath: "ci/qodana.yaml" },
    );
    const resolution = await result;

    expect(resolver.invocations[0]?.args).toContain(path.join(projectDir, "ci", "qodana.yaml"));
    expect(resolution.status).toBe("inconsistent");
    expect(messages.getMessages("error")[1]).toBe("Add `linter: x` to ci/qodana.yaml");
  });

  it("returns the resolver's exit code when it fails", async () => {
    const { result, messages } = run([{ exitCode: 3, files: { [STATE]: "{}" } }]);

    expect(await result).toEqual({ status: "failed", exitCode: 3 });
    expect(messages.getMessages("success")).toEqual([]);
  });

  it("empties the output directory before the resolver runs", async () => {
    fs.mkdirSync(outputDir(), { recursive: true });
    fs.writeFileSync(path.join(outputDir(), EFFECTIVE), "ide: STALE\n");

    const { result } = run([{}]);
    const resolution = await result;

    expect(resolution.status).toBe("resolved");
    if (resolution.status !== "resolved") return;
    expect(resolution.config.effective).toBeUndefined();
    expect(fs.readdirSync(outputDir())).toEqual([]);
  });

  it("has the artifact in place while the resolver runs", async () => {
    const present: boolean[] = [];
    const messages = createTestMessages();
    const resolver = new CannedResolver(() => {
      present.push(fs.existsSync(artifactPath(systemDir)));
      return {};
    });

    await resolveEffectiveConfig(
      { projectDir, runtimePath: "/opt/jdk/bin/java", systemDir, effectiveConfigDirName: "effective-config" },
      {
        resolver,
        messages,
        provisioner: new ResolverArtifactProvisioner(bufferArtifactSource(new Uint8Array([1])), messages),
      },
    );

    expect(present).toEqual([true]);
  });

  it("refuses an output directory outside the scratch root and leaves its neighbours alone", async () => {
    const root = makeTempDir("root");
    const bystander = path.join(root, "keep.txt");
    fs.writeFileSync(bystander, "unrelated");

    try {
      const { result, resolver } = run([{}], {
        systemDir: path.join(root, "scratch"),
        effectiveConfigDirName: "..",
      });

      await expect(result).rejects.toThrow(InvalidOutputDirError);
      expect(fs.readFileSync(bystander, "utf8")).toBe("unrelated");
      expect(resolver.invocations).toEqual([]);
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });

  it("refuses the artifact directory as output directory", async () => {
    const { result, resolver } = run([{}], { effectiveConfigDirName: "tools" });

    await expect(result).rejects.toThrow(
      "Invalid effective configuration directory name 'tools': 'tools' is used by lintweave inside the scratch directory",
    );
    expect(resolver.invocations).toEqual([]);
    expect(fs.existsSync(artifactPath(systemDir))).toBe(false);
  });

  it("throws on an incoherent output set", async () => {
    const { result } = run([{ files: { [LOCAL_ECHO]: "ide: QDJVM\n" } }]);
    await expect(result).rejects.toThrow(InvalidOutputSetError);
  });

  it("throws without a runtime", async () => {
    const { result, resolver } = run([{}], { runtimePath: undefined });

    await expect(result).rejects.toThrow(MissingRuntimeError);
    expect(resolver.invocations).toEqual([]);
  });

  describe("artifact lifecycle", () => {
    const cases: [string, CannedOutput[], Partial<ResolveEffectiveConfigInput>][] = [
      ["resolved", [{ files: { [EFFECTIVE]: "ide: QDPY\n", [STATE]: "{}" } }], {}],
      ["failed", [{ exitCode: 1 }], {}],
      ["inconsistent", [{ files: { [EFFECTIVE]: "ide: QDPY\n", [LOCAL_ECHO]: "", [STATE]: "{}" } }], {}],
      ["thrown", [{ files: { [LOCAL_ECHO]: "" } }], {}],
      ["no runtime", [{}], { runtimePath: undefined }],
    ];

    it.each(cases)("deletes the artifact after a %s pass", async (_label, outputs, overrides) => {
      const { result } = run(outputs, overrides);
      await result.catch(() => undefined);

      expect(fs.existsSync(artifactPath(systemDir))).toBe(false);
    });
  });
});
