// Free-text scrubbing for messages headed to logs or the audit sink.
// Structured log fields are handled by pino's redact paths (see logging.ts).

const TEXT_PATTERNS: Array<[RegExp, string]> = [
  [/"value"\s*:\s*"[^"]*"/gi, '"value":"[REDACTED]"'],
  [/"cookie"\s*:\s*"[^"]*"/gi, '"cookie":"[REDACTED]"'],
  [/Cookie:\s*[^\s]+/gi, 'Cookie: [REDACTED]'],
  [/Authorization:\s*(Bearer\s+)?[^\s]+/gi, 'Authorization: [REDACTED]'],
  [/password[=:]\s*[^\s,&]+/gi, 'password=[REDACTED]'],
  [/token[=:]\s*[^\s,&]+/gi, 'token=[REDACTED]'],
  [/secret[=:]\s*[^\s,&]+/gi, 'secret=[REDACTED]'],
  [/api[_-]?key[=:]\s*[^\s,&]+/gi, 'api_key=[REDACTED]'],
];

export function redactText(message: string): string {
  let out = message;
  for (const [re, replacement] of TEXT_PATTERNS) {
    out = out.replace(re, replacement);
  }
  return out;
}

