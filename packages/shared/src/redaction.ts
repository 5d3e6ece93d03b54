const REDACTION_PLACEHOLDER = '[REDACTED]';

// Common API key prefixes and patterns
const apiKeyPatterns = [
  /sk-(?:proj-)?[a-zA-Z0-9]{20,}/g, // OpenAI style
  /AIza[0-9A-Za-z\-_]{35}/g, // Google style
];

// Patterns for environment variables
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const allPatterns = [...apiKeyPatterns, ...envVarPatterns];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

/**
 * Shows only the last four characters of an API key, for debug output.
 */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length > 4) {
    return `...${apiKey.slice(-4)}`;
  }
  return '(too short to truncate)';
}
