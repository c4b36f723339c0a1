/**
 * Structural validation of kubeconfig files.
 *
 * Syntactic only: the document must be a mapping whose clusters, contexts
 * and users are non-empty sequences. Entries are not cross-checked.
 */

import fs from "fs/promises";
import { load as parseYaml } from "js-yaml";
import { z, type ZodIssue } from "zod";
import { StructureInvalidError, errorMessage } from "../src/lib/utils/errors.js";

export const REQUIRED_SECTIONS = ["clusters", "contexts", "users"] as const;

const section = z.array(z.unknown()).nonempty();

const KubeconfigSchema = z
  .object({
    clusters: section,
    contexts: section,
    users: section,
  })
  .passthrough();

export type KubeconfigDocument = z.infer<typeof KubeconfigSchema>;

const NamedCluster = z.object({
  name: z.string(),
  cluster: z.object({ server: z.string() }).passthrough(),
});

const NamedContext = z.object({
  name: z.string(),
  context: z.object({ cluster: z.string() }).passthrough(),
});

function describeIssue(issue: ZodIssue): string {
  const key = issue.path.join(".");
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return `missing required key: ${key}`;
  }
  if (issue.code === "too_small") {
    return `${key} is empty`;
  }
  if (issue.code === "invalid_type" && issue.expected === "array") {
    return `${key} is not a sequence`;
  }
  return `${key}: ${issue.message}`;
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse kubeconfig text (YAML or JSON) and check its structure.
 * Throws StructureInvalidError naming the first problem found.
 */
export function parseKubeconfig(content: string, path?: string): KubeconfigDocument {
  const where = path ? `Kubeconfig ${path}` : "Kubeconfig";

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new StructureInvalidError(`${where} does not parse: ${errorMessage(error)}`, path);
  }

  if (!isMapping(document)) {
    throw new StructureInvalidError(`${where} is not a mapping`, path);
  }

  const parsed = KubeconfigSchema.safeParse(document);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(describeIssue);
    throw new StructureInvalidError(`${where} ${problems[0]}`, path, { problems });
  }
  return parsed.data;
}

/**
 * Read a kubeconfig file and check its structure. Read-only.
 */
export async function validateStructure(path: string): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf8");
  } catch (error) {
    throw new StructureInvalidError(
      `Kubeconfig ${path} is unreadable: ${errorMessage(error)}`,
      path
    );
  }
  parseKubeconfig(content, path);
}

/**
 * API server of the current context, read from the document rather than
 * scraped from `kubectl cluster-info`. Undefined when the current context or
 * its cluster cannot be resolved.
 */
export function currentServer(document: KubeconfigDocument): string | undefined {
  const contextName = document["current-context"];
  if (typeof contextName !== "string" || !contextName) return undefined;

  const context = document.contexts
    .map((entry) => NamedContext.safeParse(entry))
    .flatMap((result) => (result.success ? [result.data] : []))
    .find((entry) => entry.name === contextName);
  if (!context) return undefined;

  const cluster = document.clusters
    .map((entry) => NamedCluster.safeParse(entry))
    .flatMap((result) => (result.success ? [result.data] : []))
    .find((entry) => entry.name === context.context.cluster);
  return cluster?.cluster.server;
}

/**
 * True when any group or world permission bit is set.
 */
export function isGroupOrWorldAccessible(mode: number): boolean {
  return (mode & 0o077) !== 0;
}
