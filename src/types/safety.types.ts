/**
 * Safety Types
 *
 * Severity is ordinal; the guardrail compares ranks, never labels.
 */

export const SEVERITIES = ['none', 'low', 'medium', 'high', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const SAFETY_LEVELS = ['strict', 'standard', 'permissive'] as const;
export type SafetyLevel = (typeof SAFETY_LEVELS)[number];

export type SafetyDecision = 'allow' | 'allow-with-redaction' | 'reject';

export type SafetyLayer = 'banned-term' | 'pattern' | 'structural' | 'model-review';

export interface SafetyViolation {
  layer: SafetyLayer;
  category: string;
  /** Flagged span; empty for model review findings, which have no span. */
  match: string;
  severity: Exclude<Severity, 'none'>;
  /** Reviewer's explanation and suggested fix. */
  reason?: string;
  suggestion?: string;
}

export interface SafetyVerdict {
  severity: Severity;
  violations: SafetyViolation[];
  decision: SafetyDecision;
  /** Text for downstream stages; redacted when decision is allow-with-redaction. */
  text: string;
}

export interface SafetyContext {
  gradeLevel?: number;
  /** Free-form label carried into the audit log (e.g. 'intervention', 'curriculum'). */
  source?: string;
}

/** Optional fourth layer: a second opinion on text the rule layers did not reject. */
export interface ContentReviewer {
  review(text: string, context: SafetyContext): Promise<SafetyViolation | null>;
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function maxSeverity(severities: Severity[]): Severity {
  return severities.reduce<Severity>((acc, s) => (severityRank(s) > severityRank(acc) ? s : acc), 'none');
}
