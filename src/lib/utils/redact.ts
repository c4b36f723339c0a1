/**
 * Redact credential material from strings before logging
 */

const SENSITIVE_KEYS =
  "token|password|client-key-data|client-certificate-data|access-token|id-token|refresh-token";

/**
 * Redacts kubeconfig secrets from YAML, JSON and flag-style text.
 * Matches `token: value`, `"token": "value"` and `--token=value`
 * and replaces the value portion with [REDACTED]
 */
export function redactSensitive(input: string): string {
  return input
    .replace(
      new RegExp(`("(?:${SENSITIVE_KEYS})"\\s*:\\s*)"[^"]*"`, "gi"),
      '$1"[REDACTED]"'
    )
    .replace(
      new RegExp(`^(\\s*-?\\s*)(${SENSITIVE_KEYS}):[ \\t]*(\\S.*)$`, "gim"),
      "$1$2: [REDACTED]"
    )
    .replace(
      new RegExp(`--(${SENSITIVE_KEYS})=(\\S+)`, "gi"),
      "--$1=[REDACTED]"
    );
}
