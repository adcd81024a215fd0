/**
 * Credential redaction for taskhooks.
 *
 * Hook stderr excerpts end up in the audit log and the diagnostic log goes
 * to ~/.taskhooks/logs/. Both pass through redactCredentials() first.
 */

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

export const REDACTED = "***REDACTED***";

/**
 * Patterns that indicate a string contains a credential.
 *
 * Note: these patterns are intentionally non-global so .test() is safe
 * to call repeatedly without lastIndex side-effects.
 */
const CREDENTIAL_DETECTION_PATTERNS: RegExp[] = [
  /(api.?key|token|password|passwd|secret|credential)[=:]\s*\S+/i,
  /\bBearer\s+[A-Za-z0-9._~+/-]{16,}/,
  /sk-[A-Za-z0-9_-]{20,}/,
  /ghp_[A-Za-z0-9]{36,}/,
  /gho_[A-Za-z0-9]{36,}/,
  /github_pat_[A-Za-z0-9_]{22,}/,
  /xox[abpr]-[A-Za-z0-9-]{10,}/,
  /AKIA[0-9A-Z]{16}/,
];

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

/**
 * Redact credential values from a string.
 *
 * Replaces sensitive key=value patterns and known token formats
 * with ***REDACTED***.
 */
export function redactCredentials(input: string): string {
  let result = input.replace(
    /(api.?key|token|password|passwd|secret|credential)[=:]\s*\S+/gi,
    `$1=${REDACTED}`,
  );
  result = result.replace(/\bBearer\s+[A-Za-z0-9._~+/-]{16,}/g, `Bearer ${REDACTED}`);
  result = result.replace(/sk-[A-Za-z0-9_-]{20,}/g, REDACTED);
  result = result.replace(/ghp_[A-Za-z0-9]+/g, REDACTED);
  result = result.replace(/gho_[A-Za-z0-9]+/g, REDACTED);
  result = result.replace(/github_pat_[A-Za-z0-9_]+/g, REDACTED);
  result = result.replace(/xox[abpr]-[A-Za-z0-9-]+/g, REDACTED);
  result = result.replace(/AKIA[0-9A-Z]{16}/g, REDACTED);
  return result;
}

/** Whether the string contains something that looks like a credential. */
export function containsCredential(input: string): boolean {
  return CREDENTIAL_DETECTION_PATTERNS.some((pattern) => pattern.test(input));
}
