/**
 * Input Sanitization Utility
 *
 * Lightweight sanitization for questions and retrieved passages before they
 * are placed inside prompts:
 * 1. Pattern detection - flag common injection phrasing (logged, not blocked)
 * 2. Escaping - neutralize the boundary markers the prompts rely on
 * 3. Length limiting - keep a single input from exhausting the token budget
 */

import { loggers, logSecurityEvent } from '@/lib/logger';

const log = loggers.security.child({ service: 'sanitize' });

// =============================================================================
// Configuration
// =============================================================================

export const MAX_LENGTHS = {
  QUESTION: 1000,
  HISTORY_MESSAGE: 2000,
  CHUNK_CONTENT: 4000,
} as const;

const INJECTION_PATTERNS: Array<{ name: string; pattern: RegExp }> = [
  { name: 'instruction_override', pattern: /ignore\s+(all\s+)?(previous|prior|above)\s+(instructions?|prompts?|rules?)/i },
  { name: 'instruction_override', pattern: /disregard\s+(all\s+)?(previous|prior|above)/i },
  { name: 'role_manipulation', pattern: /you\s+are\s+(now|actually|really)\s+(a|an|the)/i },
  { name: 'role_manipulation', pattern: /pretend\s+(to\s+be|you('re| are))/i },
  { name: 'prompt_extraction', pattern: /(reveal|show|print|output)\s+(me\s+)?(your|the)\s+(system\s+)?(prompt|instructions)/i },
  { name: 'boundary_attack', pattern: /(<<<|>>>)\s*(system|end|user|context)/i },
  { name: 'jailbreak', pattern: /jailbreak|do\s+anything\s+now|bypass\s+(safety|filter|restrictions)/i },
];

const ESCAPE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Boundary markers used by the prompt templates
  { pattern: /<<<+/g, replacement: '< < <' },
  { pattern: />>>+/g, replacement: '> > >' },
  { pattern: /<\/?(system|instruction|prompt)>/gi, replacement: '[$1]' },

  // Control characters other than tab and newline
  { pattern: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, replacement: '' },
  { pattern: /\n{4,}/g, replacement: '\n\n\n' },
];

// =============================================================================
// Types
// =============================================================================

export interface SanitizeResult {
  sanitized: string;
  truncated: boolean;
  detectedPatterns: string[];
}

export interface SanitizeOptions {
  maxLength: number;
  source: 'question' | 'history' | 'document';
}

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Names of the injection patterns found in the text, without duplicates.
 */
export function detectInjectionPatterns(text: string): string[] {
  const detected = new Set<string>();
  for (const { name, pattern } of INJECTION_PATTERNS) {
    if (pattern.test(text)) detected.add(name);
  }
  return [...detected];
}

export function applyEscapePatterns(text: string): string {
  return ESCAPE_PATTERNS.reduce((result, { pattern, replacement }) => result.replace(pattern, replacement), text);
}

/**
 * Truncate text, preferring a word boundary in the last fifth of the budget.
 */
export function truncateAtWord(text: string, maxLength: number): { text: string; truncated: boolean } {
  if (text.length <= maxLength) {
    return { text, truncated: false };
  }

  let truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace > maxLength * 0.8) {
    truncated = truncated.slice(0, lastSpace);
  }

  return { text: `${truncated}...`, truncated: true };
}

export function sanitize(text: string, options: SanitizeOptions): SanitizeResult {
  const trimmed = text.trim();
  const detectedPatterns = detectInjectionPatterns(trimmed);

  if (detectedPatterns.length > 0) {
    logSecurityEvent(log, 'prompt_injection', {
      input: trimmed,
      reason: `${options.source}: ${detectedPatterns.join(', ')}`,
    });
  }

  const { text: limited, truncated } = truncateAtWord(applyEscapePatterns(trimmed), options.maxLength);

  return { sanitized: limited, truncated, detectedPatterns };
}

// =============================================================================
// Specialized Sanitizers
// =============================================================================

export function sanitizeQuestion(question: string): string {
  return sanitize(question, { maxLength: MAX_LENGTHS.QUESTION, source: 'question' }).sanitized;
}

export function sanitizeHistoryMessage(content: string): string {
  return sanitize(content, { maxLength: MAX_LENGTHS.HISTORY_MESSAGE, source: 'history' }).sanitized;
}

export function sanitizeChunkContent(content: string): string {
  return sanitize(content, { maxLength: MAX_LENGTHS.CHUNK_CONTENT, source: 'document' }).sanitized;
}
