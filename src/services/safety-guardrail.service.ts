/**
 * Safety Guardrail
 *
 * Classifies model output before anything reaches a teacher or a child.
 * Layers run in a fixed order:
 *   1. banned terms by category (data/safety/banned-terms.json)
 *   2. pattern heuristics: violence, self-harm, personal-data requests, stranger contact
 *   3. structural red flags for the declared grade
 *   4. optional model review (screen() only)
 *
 * Overall severity is the maximum across violations; the configured safety
 * level maps it to allow, allow-with-redaction or reject. Every verdict is
 * logged and counted, including clean ones.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  maxSeverity,
  type ContentReviewer,
  type SafetyContext,
  type SafetyDecision,
  type SafetyLayer,
  type SafetyLevel,
  type SafetyVerdict,
  type SafetyViolation,
  type Severity,
} from '../types/safety.types';
import { getSafetyDecisionCounter } from '../metrics/gateway.metrics';
import { SafetyRejection } from '../utils/errors';
import { logger } from '../utils/logger';

export const REDACTION_MARKER = '[removed]';

export const DECISION_TABLE: Record<SafetyLevel, Record<Severity, SafetyDecision>> = {
  strict: { none: 'allow', low: 'reject', medium: 'reject', high: 'reject', critical: 'reject' },
  standard: { none: 'allow', low: 'allow', medium: 'allow-with-redaction', high: 'reject', critical: 'reject' },
  permissive: { none: 'allow', low: 'allow', medium: 'allow', high: 'allow-with-redaction', critical: 'reject' },
};

const ViolationSeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

const BannedTermsFileSchema = z.object({
  categories: z
    .array(
      z.object({
        category: z.string().min(1),
        severity: ViolationSeveritySchema,
        terms: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

export type BannedTermCategory = z.infer<typeof BannedTermsFileSchema>['categories'][number];

export function loadBannedTerms(
  file = path.resolve(__dirname, '../../data/safety/banned-terms.json')
): BannedTermCategory[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return BannedTermsFileSchema.parse(raw).categories;
}

interface Rule {
  layer: SafetyLayer;
  category: string;
  severity: Exclude<Severity, 'none'>;
  pattern: RegExp;
}

interface Hit {
  violation: SafetyViolation;
  start: number;
  end: number;
}

// Spans never cross a quote so that redaction keeps JSON string values intact.
const PATTERN_RULES: Rule[] = [
  {
    layer: 'pattern',
    category: 'violence',
    severity: 'high',
    pattern: /\b(?:hit|punch|kick|slap|hurt|attack|bite)\s+(?:a\s+|the\s+|your\s+|their\s+|another\s+)?(?:classmates?|friends?|students?|peers?|someone|each other|other children)\b/gi,
  },
  {
    layer: 'pattern',
    category: 'self-harm',
    severity: 'critical',
    pattern: /\b(?:hurt|harm|cut|injure|punish)\s+(?:yourself|themselves|himself|herself|oneself)\b|\bsuicid\w*|\bself[- ]harm\w*/gi,
  },
  {
    layer: 'pattern',
    category: 'personal-data-request',
    severity: 'high',
    pattern: /\b(?:share|write down|tell|give|post|send|upload|collect)\b[^."\n]{0,40}?\b(?:home address(?:es)?|phone numbers?|passwords?|full names?|dates? of birth|birthdays?|photos? of themselves|where they live)\b/gi,
  },
  {
    layer: 'pattern',
    category: 'stranger-contact',
    severity: 'high',
    pattern: /\b(?:meet|message|chat with|talk to|contact|add)\s+(?:an?\s+)?(?:strangers?|online friends?|people (?:you|they) (?:don't|do not) know)\b/gi,
  },
  {
    layer: 'pattern',
    category: 'secrecy',
    severity: 'critical',
    pattern: /\bkeep (?:it|this) (?:a )?secret from\b[^."\n]{0,30}|\b(?:don't|do not) tell (?:your|their) (?:parents?|teachers?|family)\b/gi,
  },
];

const HAZARDS = String.raw`(?:scissors|knives|knife|matches|lighters?|stoves?|ovens?|fire|candles?|chemicals|cleaning products|hot water)`;
const UNSUPERVISED = String.raw`(?:without (?:an? )?(?:adult|grown-up|teacher)(?: supervision| help)?|unsupervised|on their own|by themselves|alone)`;

/** Oldest grade for which online accounts and social media are flagged. */
const ONLINE_ACCOUNT_MAX_GRADE = 7;
/** Oldest grade for which unsupervised hazards are high rather than medium severity. */
const HAZARD_HIGH_MAX_GRADE = 5;
const YOUNGEST_GRADE = 1;

function structuralRules(gradeLevel: number): Rule[] {
  const rules: Rule[] = [
    {
      layer: 'structural',
      category: 'unsupervised-hazard',
      severity: gradeLevel <= HAZARD_HIGH_MAX_GRADE ? 'high' : 'medium',
      pattern: new RegExp(
        String.raw`\b${UNSUPERVISED}\b[^."\n]{0,60}?\b${HAZARDS}\b|\b${HAZARDS}\b[^."\n]{0,60}?\b${UNSUPERVISED}\b`,
        'gi'
      ),
    },
    {
      layer: 'structural',
      category: 'external-link',
      severity: 'low',
      pattern: /\bhttps?:\/\/[^\s"'<>)]+|\bwww\.[^\s"'<>)]+/gi,
    },
  ];
  if (gradeLevel <= ONLINE_ACCOUNT_MAX_GRADE) {
    rules.push({
      layer: 'structural',
      category: 'online-account',
      severity: 'medium',
      pattern: /\b(?:create|sign up for|make|open|register)\b[^."\n]{0,30}?\b(?:accounts?|profiles?)\b|\bsocial media\b|\b(?:tiktok|instagram|snapchat|facebook|discord)\b/gi,
    });
  }
  return rules;
}

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function bannedTermRules(categories: BannedTermCategory[]): Rule[] {
  return categories.map(({ category, severity, terms }): Rule => ({
    layer: 'banned-term',
    category,
    severity,
    pattern: new RegExp(
      String.raw`\b(?:${terms.map((t) => escapeRegExp(t).replace(/\s+/g, String.raw`\s+`)).join('|')})\b`,
      'gi'
    ),
  }));
}

function scan(text: string, rules: Rule[]): Hit[] {
  const hits: Hit[] = [];
  for (const rule of rules) {
    for (const m of text.matchAll(rule.pattern)) {
      const start = m.index ?? 0;
      hits.push({
        violation: { layer: rule.layer, category: rule.category, match: m[0], severity: rule.severity },
        start,
        end: start + m[0].length,
      });
    }
  }
  return hits;
}

/** Replaces every flagged span, merging overlaps so each region is replaced once. */
export function redactSpans(text: string, spans: Array<{ start: number; end: number }>): string {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const merged: Array<{ start: number; end: number }> = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) last.end = Math.max(last.end, span.end);
    else merged.push({ ...span });
  }
  let out = '';
  let cursor = 0;
  for (const { start, end } of merged) {
    out += text.slice(cursor, start) + REDACTION_MARKER;
    cursor = end;
  }
  return out + text.slice(cursor);
}

export interface SafetyGuardrailOptions {
  level: SafetyLevel;
  bannedTerms: BannedTermCategory[];
  /** Fourth layer; runs in screen() after the rule layers when set. */
  reviewer?: ContentReviewer;
  /** Adds per-violation layer, category and reviewer notes to rejection details. */
  includeViolationDetails?: boolean;
}

export class SafetyGuardrail {
  readonly level: SafetyLevel;
  private readonly bannedRules: Rule[];
  private readonly reviewer: ContentReviewer | undefined;
  private readonly includeViolationDetails: boolean;
  private readonly decisions = getSafetyDecisionCounter();

  constructor(options: SafetyGuardrailOptions) {
    this.level = options.level;
    this.bannedRules = bannedTermRules(options.bannedTerms);
    this.reviewer = options.reviewer;
    this.includeViolationDetails = options.includeViolationDetails ?? false;
  }

  /** Rule layers only. Synchronous so streamed text can be screened segment by segment. */
  evaluate(text: string, context: SafetyContext = {}): SafetyVerdict {
    return this.decide(text, this.scanRules(text, context), [], context);
  }

  /**
   * Rule layers, then the model review when one is configured. The review is
   * skipped when the rules alone already reject.
   */
  async screen(text: string, context: SafetyContext = {}): Promise<SafetyVerdict> {
    const hits = this.scanRules(text, context);
    const ruleSeverity = maxSeverity(hits.map((h) => h.violation.severity));
    if (!this.reviewer || DECISION_TABLE[this.level][ruleSeverity] === 'reject') {
      return this.decide(text, hits, [], context);
    }
    const finding = await this.reviewer.review(text, context);
    return this.decide(text, hits, finding ? [finding] : [], context);
  }

  rejection(verdict: SafetyVerdict): SafetyRejection {
    return new SafetyRejection(verdict, { includeViolationDetails: this.includeViolationDetails });
  }

  private scanRules(text: string, context: SafetyContext): Hit[] {
    // Unknown grade gets the youngest grade's rules.
    const grade = context.gradeLevel ?? YOUNGEST_GRADE;
    return [
      ...scan(text, this.bannedRules),
      ...scan(text, PATTERN_RULES),
      ...scan(text, structuralRules(grade)),
    ];
  }

  /** Findings carry no span, so redaction only touches rule hits. */
  private decide(text: string, hits: Hit[], findings: SafetyViolation[], context: SafetyContext): SafetyVerdict {
    const violations = [...hits.map((h) => h.violation), ...findings];
    const severity = maxSeverity(violations.map((v) => v.severity));
    const decision = DECISION_TABLE[this.level][severity];
    const verdict: SafetyVerdict = {
      severity,
      violations,
      decision,
      text: decision === 'allow-with-redaction' ? redactSpans(text, hits) : text,
    };

    this.decisions.inc({ level: this.level, decision, severity });
    const log = decision === 'reject' ? logger.warn : logger.info;
    log('safety.verdict', {
      safetyLevel: this.level,
      decision,
      severity,
      source: context.source ?? 'unknown',
      gradeLevel: context.gradeLevel ?? null,
      violations: violations.map((v) => ({
        layer: v.layer,
        category: v.category,
        severity: v.severity,
        match: v.match,
        ...(v.reason ? { reason: v.reason } : {}),
      })),
    });
    return verdict;
  }
}
