/**
 * Redaction for anything the provider logs
 *
 * Invocation payloads carry caller and provider credentials plus a bearer
 * token; error messages from the SDK can echo an access key id.
 */

export const REDACTED = '[REDACTED]';

/**
 * Payload keys whose values are always replaced
 */
const SENSITIVE_KEYS = new Set([
  'accesskeyid',
  'secretaccesskey',
  'sessiontoken',
  'bearertoken',
  'callercredentials',
  'providercredentials',
  'credentials',
  'password',
  'secret',
]);

/**
 * Patterns replaced inside free text
 */
const SENSITIVE_PATTERNS = [
  /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/g,
  /\baws_secret_access_key\s*[:=]\s*[^\s]+/gi,
  /\baws_session_token\s*[:=]\s*[^\s]+/gi,
  /\bsecret[_-]?key\s*[:=]\s*[^\s]+/gi,
  /\bBearer\s+[a-zA-Z0-9_.-]{20,}/gi,
  /\beyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\b/g,
];

/**
 * Replace credential-looking substrings of a text
 */
export function redactText(text: string): string {
  let redactedText = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    redactedText = redactedText.replace(pattern, REDACTED);
  }
  return redactedText;
}

/**
 * Deep copy of a JSON-like value with sensitive keys masked and strings scrubbed
 */
export function redactPayload(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactText(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactPayload(item));
  }

  if (typeof value === 'object' && value !== null) {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = SENSITIVE_KEYS.has(key.toLowerCase()) && entry !== null && entry !== undefined
        ? REDACTED
        : redactPayload(entry);
    }
    return copy;
  }

  return value;
}
