import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

export const DEFAULT_REGION = "us-central1";
export const DEFAULT_GKE_KUBECONFIG_PATH = "/tmp/kubeconfig-gke";
export const DEFAULT_HOSTED_KUBECONFIG_PATH = "/tmp/kubeconfig-hosted";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value === "1" || value?.toLowerCase() === "true");

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  PROJECT_ID: required("PROJECT_ID"),
  GKE_CLUSTER_NAME: required("GKE_CLUSTER_NAME"),
  HOSTED_CLUSTER_NAME: required("HOSTED_CLUSTER_NAME"),
  REGION: optionalString,
  ZONE: optionalString,
  KUBECONFIG_GKE_PATH: optionalString,
  KUBECONFIG_HOSTED_PATH: optionalString,
  DRY_RUN: booleanFlag,
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

/**
 * Settings for the management (GKE) cluster and the hosted cluster it serves
 */
export interface ClusterConfig {
  projectId: string;
  region: string;
  zone: string;
  /** GKE management cluster */
  gkeClusterName: string;
  /** Hosted cluster; its control plane lives in namespace clusters-<name> */
  hostedClusterName: string;
  gkeKubeconfigPath: string;
  hostedKubeconfigPath: string;
  dryRun: boolean;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
}

/**
 * Build the cluster config from environment variables.
 * Throws ConfigError listing every missing or malformed variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ClusterConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.message === "Required" ? `${issue.path.join(".")} is required` : issue.message
    );
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, {
      problems,
    });
  }

  const vars = parsed.data;
  const region = vars.REGION ?? DEFAULT_REGION;

  return {
    projectId: vars.PROJECT_ID,
    region,
    zone: vars.ZONE ?? `${region}-a`,
    gkeClusterName: vars.GKE_CLUSTER_NAME,
    hostedClusterName: vars.HOSTED_CLUSTER_NAME,
    gkeKubeconfigPath: vars.KUBECONFIG_GKE_PATH ?? DEFAULT_GKE_KUBECONFIG_PATH,
    hostedKubeconfigPath: vars.KUBECONFIG_HOSTED_PATH ?? DEFAULT_HOSTED_KUBECONFIG_PATH,
    dryRun: vars.DRY_RUN,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Namespace holding the hosted cluster's control plane and its admin kubeconfig secret
 */
export function hostedControlPlaneNamespace(config: ClusterConfig): string {
  return `clusters-${config.hostedClusterName}`;
}
