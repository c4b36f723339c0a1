import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StructureInvalidError } from "../src/lib/utils/errors.js";
import { kubeconfigYaml, makeTempDir } from "../src/lib/testing/fakes.js";
import {
  currentServer,
  isGroupOrWorldAccessible,
  parseKubeconfig,
  validateStructure,
} from "./validator.js";

function messageOf(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(StructureInvalidError);
    return error instanceof Error ? error.message : String(error);
  }
  throw new Error("expected StructureInvalidError");
}

describe("parseKubeconfig", () => {
  it("accepts a kubeconfig with all three sections", () => {
    const document = parseKubeconfig(kubeconfigYaml());
    expect(document.clusters).toHaveLength(1);
    expect(document.contexts).toHaveLength(1);
    expect(document.users).toHaveLength(1);
  });

  it("accepts JSON", () => {
    const json = JSON.stringify({ clusters: [{}], contexts: [{}], users: [{}] });
    expect(() => parseKubeconfig(json)).not.toThrow();
  });

  it("rejects unparseable content", () => {
    expect(messageOf(() => parseKubeconfig("clusters: [unterminated", "/k"))).toMatch(
      /^Kubeconfig \/k does not parse: /
    );
  });

  it("rejects a top-level sequence", () => {
    expect(messageOf(() => parseKubeconfig("- a\n- b\n"))).toBe("Kubeconfig is not a mapping");
  });

  it("rejects an empty document", () => {
    expect(messageOf(() => parseKubeconfig(""))).toBe("Kubeconfig is not a mapping");
  });

  it("reports a missing section", () => {
    const content = "clusters: [a]\nusers: [b]\n";
    expect(messageOf(() => parseKubeconfig(content))).toBe(
      "Kubeconfig missing required key: contexts"
    );
  });

  it("reports an empty section", () => {
    const content = "clusters: [a]\ncontexts: []\nusers: [b]\n";
    expect(messageOf(() => parseKubeconfig(content))).toBe("Kubeconfig contexts is empty");
  });

  it("reports a section that is not a sequence", () => {
    const content = "clusters: a\ncontexts: [b]\nusers: [c]\n";
    expect(messageOf(() => parseKubeconfig(content))).toBe(
      "Kubeconfig clusters is not a sequence"
    );
  });

  it("does not cross-check entries", () => {
    const content = "clusters: [1]\ncontexts: [2]\nusers: [3]\ncurrent-context: missing\n";
    expect(() => parseKubeconfig(content)).not.toThrow();
  });
});

describe("validateStructure", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("passes a valid file", async () => {
    const file = path.join(dir, "kubeconfig");
    await fs.writeFile(file, kubeconfigYaml());
    await expect(validateStructure(file)).resolves.toBeUndefined();
  });

  it("fails a missing file with StructureInvalidError", async () => {
    await expect(validateStructure(path.join(dir, "absent"))).rejects.toBeInstanceOf(
      StructureInvalidError
    );
  });

  it("fails a file without users", async () => {
    const file = path.join(dir, "kubeconfig");
    await fs.writeFile(file, "clusters: [a]\ncontexts: [b]\n");
    await expect(validateStructure(file)).rejects.toThrow(
      `Kubeconfig ${file} missing required key: users`
    );
  });
});

describe("currentServer", () => {
  it("resolves the server of the current context", () => {
    expect(currentServer(parseKubeconfig(kubeconfigYaml("https://198.51.100.7:6443")))).toBe(
      "https://198.51.100.7:6443"
    );
  });

  it("is undefined without a current context", () => {
    const content = "clusters: [a]\ncontexts: [b]\nusers: [c]\n";
    expect(currentServer(parseKubeconfig(content))).toBeUndefined();
  });

  it("is undefined when the context names an unknown cluster", () => {
    const content = [
      "clusters:",
      "  - name: other",
      "    cluster:",
      "      server: https://192.0.2.1",
      "contexts:",
      "  - name: ctx",
      "    context:",
      "      cluster: missing",
      "users: [u]",
      "current-context: ctx",
    ].join("\n");
    expect(currentServer(parseKubeconfig(content))).toBeUndefined();
  });
});

describe("isGroupOrWorldAccessible", () => {
  it("flags group and world bits only", () => {
    expect(isGroupOrWorldAccessible(0o100600)).toBe(false);
    expect(isGroupOrWorldAccessible(0o100640)).toBe(true);
    expect(isGroupOrWorldAccessible(0o100604)).toBe(true);
  });
});
