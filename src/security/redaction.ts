// Token-shaped values that may show up in page text, planner output or tool stderr
const TOKEN_PATTERNS: Array<{ pattern: RegExp; replacer: (match: string) => string }> = [
  { pattern: /eyJ[0-9A-Za-z_-]+\.[0-9A-Za-z_-]+\.[0-9A-Za-z_-]+/g, replacer: () => '<REDACTED_JWT>' },
  { pattern: /sk-[A-Za-z0-9_-]{20,}/g, replacer: () => 'sk-***REDACTED***' },
  { pattern: /AIza[0-9A-Za-z_-]{35}/g, replacer: () => 'AIza***REDACTED***' },
  { pattern: /gh[posru]_[A-Za-z0-9]{20,}/g, replacer: (m) => `${m.slice(0, 4)}***REDACTED***` },
  { pattern: /\bBearer\s+([A-Za-z0-9_.\-/+=]{8,})/g, replacer: () => 'Bearer <REDACTED>' },
];

// Key/value shapes: submission payloads carry "secret", env dumps carry *_KEY=...
const KV_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  {
    pattern: /("(?:secret|api_key|apiKey|access_token|password)")\s*:\s*"[^"]*"/gi,
    replacement: '$1: "<REDACTED>"',
  },
  {
    pattern: /\b([A-Z_]*(?:PASSWORD|SECRET|TOKEN|API_KEY)[A-Z_]*)=["']?([^"'\s]{6,})["']?/g,
    replacement: '$1=<REDACTED>',
  },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Mask secrets before text leaves the process (console, persisted records).
 * `knownSecrets` are literal values, such as a session's identity secret,
 * replaced wherever they appear.
 */
export function redact(input: string, knownSecrets: readonly string[] = []): string {
  let result = input;

  for (const secret of knownSecrets) {
    if (secret.length < 4) continue;
    result = result.replace(new RegExp(escapeRegExp(secret), 'g'), '<REDACTED>');
  }

  for (const { pattern, replacer } of TOKEN_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), replacer);
  }

  for (const { pattern, replacement } of KV_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), (fullMatch: string) => {
      if (fullMatch.includes('REDACTED')) return fullMatch;
      return fullMatch.replace(new RegExp(pattern.source, pattern.flags), replacement);
    });
  }

  return result;
}
