/**
 * Structured intent derived from overseer input
 */
export type Intent =
  | { type: 'directive'; target: string; body: string }
  | { type: 'decision'; decision: 'approve' | 'reject'; ref: string }
  | { type: 'query' }
  | { type: 'general' };

export type IntentType = Intent['type'];

/**
 * Intent classification options
 */
export interface IntentClassifierOptions {
  approveTokens: string[];
  rejectTokens: string[];
  queryKeywords: string[];
}

export const DEFAULT_APPROVE_TOKENS = ['approve', 'approved', 'accept', 'yes', 'ok', 'okay', 'lgtm', 'confirm'];
export const DEFAULT_REJECT_TOKENS = ['reject', 'rejected', 'deny', 'decline', 'no', 'nope', 'refuse'];
export const DEFAULT_QUERY_KEYWORDS = ['status', 'progress', 'update', 'report', 'how is', "how's"];

const DIRECTIVE_PATTERN = /^@([\w-]+)[:\s]+(\S[\s\S]*)$/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeTokens(tokens: string[]): string[] {
  return Array.from(new Set(tokens.map((t) => t.trim().toLowerCase()).filter((t) => t.length > 0)));
}

/**
 * Builds `^(tok|...)\b\s*(?:#?(ref))?`, a prefix match: text after the
 * reference is ignored. Longest tokens first so that `okay` wins over `ok`.
 */
function buildDecisionPattern(tokens: string[]): RegExp {
  const alternatives = [...tokens]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return new RegExp(`^(${alternatives})\\b\\s*(?:#?([\\w-]+))?`, 'i');
}

/**
 * Deterministic pattern classifier for overseer input.
 * Rules run in priority order: directive, approval, rejection, query, general.
 */
export class IntentClassifier {
  private options: IntentClassifierOptions;
  private approvePattern: RegExp;
  private rejectPattern: RegExp;

  constructor(options: Partial<IntentClassifierOptions> = {}) {
    const approveTokens = normalizeTokens(options.approveTokens ?? DEFAULT_APPROVE_TOKENS);
    const rejectTokens = normalizeTokens(options.rejectTokens ?? DEFAULT_REJECT_TOKENS);

    if (approveTokens.length === 0 || rejectTokens.length === 0) {
      throw new Error('Approve and reject token sets must not be empty');
    }

    const overlap = approveTokens.filter((token) => rejectTokens.includes(token));
    if (overlap.length > 0) {
      throw new Error(`Approve and reject tokens overlap: ${overlap.join(', ')}`);
    }

    this.options = {
      approveTokens,
      rejectTokens,
      queryKeywords: normalizeTokens(options.queryKeywords ?? DEFAULT_QUERY_KEYWORDS),
    };
    this.approvePattern = buildDecisionPattern(approveTokens);
    this.rejectPattern = buildDecisionPattern(rejectTokens);
  }

  /**
   * Classify raw input. Never throws; unmatched input is `general`.
   */
  classify(input: string): Intent {
    const directive = input.match(DIRECTIVE_PATTERN);
    if (directive) {
      return {
        type: 'directive',
        target: directive[1] ?? '',
        body: (directive[2] ?? '').trim(),
      };
    }

    const trimmed = input.trim();

    const approval = trimmed.match(this.approvePattern);
    if (approval) {
      return { type: 'decision', decision: 'approve', ref: approval[2] ?? '' };
    }

    const rejection = trimmed.match(this.rejectPattern);
    if (rejection) {
      return { type: 'decision', decision: 'reject', ref: rejection[2] ?? '' };
    }

    const lowered = trimmed.toLowerCase();
    if (this.options.queryKeywords.some((keyword) => lowered.includes(keyword)) || trimmed.endsWith('?')) {
      return { type: 'query' };
    }

    return { type: 'general' };
  }

  /**
   * Get classifier options
   */
  getOptions(): IntentClassifierOptions {
    return {
      approveTokens: [...this.options.approveTokens],
      rejectTokens: [...this.options.rejectTokens],
      queryKeywords: [...this.options.queryKeywords],
    };
  }
}

/**
 * Create an intent classifier
 */
export function createIntentClassifier(
  options: Partial<IntentClassifierOptions> = {}
): IntentClassifier {
  return new IntentClassifier(options);
}

const defaultClassifier = new IntentClassifier();

/**
 * Classify with the default token sets
 */
export function classifyIntent(input: string): Intent {
  return defaultClassifier.classify(input);
}
