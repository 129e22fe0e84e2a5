const REDACTION_PLACEHOLDER = '[REDACTED]';

// Credentials embedded in clone URLs: https://oauth2:<token>@host/...
const urlCredentialPattern = /(\b[a-z][a-z0-9+.-]*:\/\/)[^\s/@:]+(?::[^\s/@]*)?@/gi;

// Common API key and access token prefixes
const apiKeyPatterns = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI style
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
  /github_pat_[a-zA-Z0-9_]{20,}/g,
  /glpat-[a-zA-Z0-9_-]{20,}/g, // GitLab token
];

const bearerPattern = /\bBearer\s+[A-Za-z0-9._~+/=-]+/g;

// ?token=..., &access_token=...
const queryTokenPattern = /([?&](?:access_)?token=)[^&\s]+/gi;

// Patterns for environment variables
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const privateKeyPattern =
  /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----(?:.|\n|\r)*?-----END (?:[A-Z]+ )?PRIVATE KEY-----/g;

const allPatterns = [...apiKeyPatterns, bearerPattern, ...envVarPatterns, privateKeyPattern];

function countMatches(input: string, pattern: RegExp): number {
  return input.match(pattern)?.length ?? 0;
}

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  redactionCount += countMatches(redacted, urlCredentialPattern);
  redacted = redacted.replace(urlCredentialPattern, `$1${REDACTION_PLACEHOLDER}@`);

  redactionCount += countMatches(redacted, queryTokenPattern);
  redacted = redacted.replace(queryTokenPattern, `$1${REDACTION_PLACEHOLDER}`);

  for (const pattern of allPatterns) {
    const matches = countMatches(redacted, pattern);
    if (matches > 0) {
      redactionCount += matches;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item: unknown) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}

/**
 * Message of an unknown thrown value with every credential removed.
 * Used for anything persisted to a task record, logged, or printed.
 */
export function scrubErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return redactString(message).redacted;
}

/**
 * Stack trace (or `name: message` when there is none) with every credential
 * removed. Loggers print this instead of the raw error object.
 */
export function scrubErrorStack(error: unknown): string {
  if (!(error instanceof Error)) return redactString(String(error)).redacted;
  return redactString(error.stack ?? `${error.name}: ${error.message}`).redacted;
}

/**
 * Redacted copy of a structured value, ready to serialize into a log line.
 */
export function redactForLogs(value: object): Record<string, unknown> {
  const { redacted } = redactUnknown(value);
  if (typeof redacted !== 'object' || redacted === null || Array.isArray(redacted)) {
    return {};
  }
  return { ...redacted };
}
