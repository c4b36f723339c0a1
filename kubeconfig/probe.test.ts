import { describe, expect, it } from "vitest";
import { FakeRunner, captureLogger, fail, succeed } from "../src/lib/testing/fakes.js";
import { silentLogger } from "../src/lib/utils/logger.js";
import { probeConnectivity } from "./probe.js";

describe("probeConnectivity", () => {
  it("runs kubectl cluster-info against the given kubeconfig", async () => {
    const runner = new FakeRunner(() => succeed("Kubernetes control plane is running"));

    expect(await probeConnectivity(runner, "/tmp/kubeconfig-gke", silentLogger())).toBe(true);
    expect(runner.calls).toEqual([
      {
        command: "kubectl",
        args: ["cluster-info", "--request-timeout=10s"],
        env: { KUBECONFIG: "/tmp/kubeconfig-gke" },
        timeoutMs: 15_000,
      },
    ]);
  });

  it("honours custom timeouts", async () => {
    const runner = new FakeRunner(() => succeed());
    await probeConnectivity(runner, "/k", silentLogger(), {
      requestTimeoutSeconds: 3,
      processTimeoutMs: 5_000,
    });
    expect(runner.calls[0].args).toEqual(["cluster-info", "--request-timeout=3s"]);
    expect(runner.calls[0].timeoutMs).toBe(5_000);
  });

  it("reports failure with a warning naming the path", async () => {
    const runner = new FakeRunner(() => fail("Unable to connect to the server"));
    const { log, entries } = captureLogger();

    expect(await probeConnectivity(runner, "/tmp/kubeconfig-hosted", log)).toBe(false);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      severity: "WARNING",
      msg: "kubeconfig failed connectivity test",
      path: "/tmp/kubeconfig-hosted",
      exitCode: 1,
      timedOut: false,
    });
  });

  it("treats a timeout as failure", async () => {
    const runner = new FakeRunner(() => ({
      ok: false,
      exitCode: null,
      stdout: "",
      stderr: "",
      timedOut: true,
    }));
    expect(await probeConnectivity(runner, "/k", silentLogger())).toBe(false);
  });

  it("makes exactly one call per probe", async () => {
    const runner = new FakeRunner(() => fail());
    await probeConnectivity(runner, "/k", silentLogger());
    expect(runner.calls).toHaveLength(1);
  });
});
