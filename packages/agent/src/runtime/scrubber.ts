import { ConfigError, errorMessage } from './errors.js';

export interface ScrubPattern {
  name: string;
  pattern: RegExp;
  replacement?: string;
}

/** Redactions applied to free-text command output such as process arguments */
export const DEFAULT_SCRUB_PATTERNS: readonly ScrubPattern[] = [
  {
    name: 'env-var-secrets',
    pattern: /\b(\w*(?:SECRET|KEY|TOKEN|PASSWORD|CREDENTIAL|PRIVATE)\w*)\s*[=:]\s*\S+/gi,
    replacement: '$1=[REDACTED]',
  },
  {
    name: 'cli-password-flags',
    pattern: /(--(?:password|passwd|token|secret)[= ])\S+/gi,
    replacement: '$1[REDACTED]',
  },
  {
    name: 'connection-strings',
    pattern:
      /((?:postgres|postgresql|mysql|mongodb(?:\+srv)?|redis|amqp|mssql):\/\/[^:\s]+:)[^@\s]+(@)/gi,
    replacement: '$1[REDACTED]$2',
  },
  {
    name: 'bearer-tokens',
    pattern: /(Bearer\s+)\S+/gi,
    replacement: '$1[REDACTED]',
  },
];

export function scrubString(str: string, patterns: readonly ScrubPattern[]): string {
  let result = str;
  for (const p of patterns) {
    // Global regexes carry state between calls
    p.pattern.lastIndex = 0;
    result = result.replace(p.pattern, p.replacement ?? '[REDACTED]');
  }
  return result;
}

/**
 * Build scrub patterns from defaults + optional custom regex strings.
 * Throws ConfigError on a custom regex that does not compile.
 */
export function buildPatterns(customRegexes: readonly string[] = []): ScrubPattern[] {
  const patterns = [...DEFAULT_SCRUB_PATTERNS];

  for (const raw of customRegexes) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(raw, 'gi');
    } catch (err: unknown) {
      throw new ConfigError(`Invalid scrub pattern /${raw}/: ${errorMessage(err)}`, { cause: err });
    }
    patterns.push({ name: `custom:${raw}`, pattern });
  }

  return patterns;
}
