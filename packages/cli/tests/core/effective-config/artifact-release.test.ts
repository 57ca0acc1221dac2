import { beforeEach, describe, it, expect, vi } from "vitest";

const fsExtra = vi.hoisted(() => ({
  ensureDir: vi.fn(),
  outputFile: vi.fn(),
  remove: vi.fn(),
}));

vi.mock("fs-extra/esm", () => fsExtra);

import { ResolverArtifactProvisioner, bufferArtifactSource } from "../../../src/core/effective-config/index.js";
import { createTestMessages } from "../../../src/core/messages.js";

describe("ResolverArtifactProvisioner release", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    fsExtra.ensureDir.mockResolvedValue(undefined);
    fsExtra.outputFile.mockResolvedValue(undefined);
  });

  it("writes the artifact readable by the runtime", async () => {
    const provisioner = new ResolverArtifactProvisioner(bufferArtifactSource(new Uint8Array([1])), createTestMessages());

    const artifact = await provisioner.provision("/nonexistent-scratch");

    expect(fsExtra.ensureDir).toHaveBeenCalledWith("/nonexistent-scratch/tools");
    expect(fsExtra.outputFile).toHaveBeenCalledWith(artifact.path, new Uint8Array([1]), { mode: 0o644 });
  });

  it("turns a failed delete into a warning", async () => {
    fsExtra.remove.mockRejectedValue(new Error("EBUSY: resource busy"));
    const messages = createTestMessages();
    const provisioner = new ResolverArtifactProvisioner(bufferArtifactSource(new Uint8Array([1])), messages);

    const artifact = await provisioner.provision("/nonexistent-scratch");
    await expect(artifact.release()).resolves.toBeUndefined();

    expect(messages.getMessages("warn")).toEqual(["Failed to delete config-resolver.jar: EBUSY: resource busy"]);
  });

  it("wraps a failed write", async () => {
    fsExtra.outputFile.mockRejectedValue(new Error("ENOSPC: no space left on device"));
    const provisioner = new ResolverArtifactProvisioner(bufferArtifactSource(new Uint8Array([1])), createTestMessages());

    await expect(provisioner.provision("/nonexistent-scratch")).rejects.toThrow(
      "Failed to write config-resolver.jar content to /nonexistent-scratch/tools/config-resolver.jar: ENOSPC: no space left on device",
    );
  });
});
