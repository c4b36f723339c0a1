import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AcquisitionFailedError } from "../src/lib/utils/errors.js";
import { silentLogger } from "../src/lib/utils/logger.js";
import {
  FakeRunner,
  fail,
  kubeconfigYaml,
  makeTempDir,
  succeed,
  testConfig,
} from "../src/lib/testing/fakes.js";
import {
  decodeBase64Strict,
  extractWorkloadKubeconfig,
  fetchManagementKubeconfig,
} from "./sources.js";

const encode = (text: string) => Buffer.from(text, "utf8").toString("base64");

describe("decodeBase64Strict", () => {
  it("decodes padded base64, ignoring line breaks", () => {
    expect(decodeBase64Strict("aGVs\nbG8=\n")).toBe("hello");
  });

  it.each([["not base64!"], ["abc"], [""], ["   "]])("rejects %j", (input) => {
    expect(() => decodeBase64Strict(input)).toThrow(AcquisitionFailedError);
  });
});

describe("credential sources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    await fs.mkdir(path.join(dir, "gke"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("fetchManagementKubeconfig", () => {
    it("returns what gcloud wrote to the scratch file and removes it", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(async (call) => {
        await fs.writeFile(call.env.KUBECONFIG, kubeconfigYaml());
        return succeed();
      });

      const content = await fetchManagementKubeconfig({
        config,
        runner,
        log: silentLogger(),
        targetPath: config.gkeKubeconfigPath,
      });

      expect(content).toBe(kubeconfigYaml());
      expect(runner.calls).toEqual([
        {
          command: "gcloud",
          args: [
            "container",
            "clusters",
            "get-credentials",
            "mgmt",
            "--zone=us-central1-a",
            "--project=test-project",
          ],
          env: { KUBECONFIG: `${config.gkeKubeconfigPath}.acquire` },
          timeoutMs: 120_000,
        },
      ]);
      expect(await fs.readdir(path.join(dir, "gke"))).toEqual([]);
    });

    it("fails when gcloud fails", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(() => fail("ERROR: (gcloud) not authenticated"));

      await expect(
        fetchManagementKubeconfig({
          config,
          runner,
          log: silentLogger(),
          targetPath: config.gkeKubeconfigPath,
        })
      ).rejects.toThrow("gcloud get-credentials failed for mgmt");
    });

    it("fails when gcloud writes nothing", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(() => succeed());

      await expect(
        fetchManagementKubeconfig({
          config,
          runner,
          log: silentLogger(),
          targetPath: config.gkeKubeconfigPath,
        })
      ).rejects.toThrow(/^gcloud reported success but wrote no kubeconfig/);
    });

    it("fails when gcloud writes an empty file", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(async (call) => {
        await fs.writeFile(call.env.KUBECONFIG, "\n");
        return succeed();
      });

      await expect(
        fetchManagementKubeconfig({
          config,
          runner,
          log: silentLogger(),
          targetPath: config.gkeKubeconfigPath,
        })
      ).rejects.toThrow("gcloud wrote an empty kubeconfig");
      expect(await fs.readdir(path.join(dir, "gke"))).toEqual([]);
    });
  });

  describe("extractWorkloadKubeconfig", () => {
    it("reads and decodes the admin kubeconfig secret through the management kubeconfig", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(() => succeed(encode(kubeconfigYaml())));

      const content = await extractWorkloadKubeconfig({
        config,
        runner,
        log: silentLogger(),
        targetPath: config.hostedKubeconfigPath,
      });

      expect(content).toBe(kubeconfigYaml());
      expect(runner.calls).toEqual([
        {
          command: "kubectl",
          args: [
            "get",
            "secret",
            "admin-kubeconfig",
            "-n",
            "clusters-guest",
            "-o",
            "jsonpath={.data.kubeconfig}",
          ],
          env: { KUBECONFIG: config.gkeKubeconfigPath },
          timeoutMs: 60_000,
        },
      ]);
    });

    it("fails on empty output", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(() => succeed("  \n"));

      await expect(
        extractWorkloadKubeconfig({
          config,
          runner,
          log: silentLogger(),
          targetPath: config.hostedKubeconfigPath,
        })
      ).rejects.toThrow("Could not retrieve secret clusters-guest/admin-kubeconfig");
    });

    it("fails on malformed base64", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(() => succeed("%%%not-base64%%%"));

      await expect(
        extractWorkloadKubeconfig({
          config,
          runner,
          log: silentLogger(),
          targetPath: config.hostedKubeconfigPath,
        })
      ).rejects.toThrow("Secret data is not valid base64");
    });

    it("fails when the decoded document has no clusters", async () => {
      const config = testConfig(dir);
      const runner = new FakeRunner(() => succeed(encode("- just\n- a list\n")));

      await expect(
        extractWorkloadKubeconfig({
          config,
          runner,
          log: silentLogger(),
          targetPath: config.hostedKubeconfigPath,
        })
      ).rejects.toThrow("Invalid kubeconfig data: no clusters section");
    });
  });
});
