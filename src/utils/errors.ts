import { ErrorCodes, type ErrorCode } from '../types/api.types';
import type { GatewayCallResult } from '../types/gateway.types';
import type { SafetyLayer, SafetyVerdict, Severity } from '../types/safety.types';

export class AppError extends Error {
  public statusCode: number;
  public code: ErrorCode;
  public details?: Record<string, unknown>;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class TemplateNotFoundError extends AppError {
  public readonly templateId: string;

  constructor(templateId: string, message = `No prompt template registered for "${templateId}"`) {
    super(message, 500, ErrorCodes.TEMPLATE_NOT_FOUND, { templateId });
    this.name = 'TemplateNotFoundError';
    this.templateId = templateId;
  }
}

/** Timeout, throttle or upstream 5xx. Retried inside the gateway and never surfaced. */
export class GatewayTransientError extends AppError {
  public readonly httpStatus?: number;

  constructor(message: string, httpStatus?: number) {
    super(message, 503, ErrorCodes.GATEWAY_TRANSIENT, httpStatus ? { httpStatus } : undefined);
    this.name = 'GatewayTransientError';
    this.httpStatus = httpStatus;
  }
}

export class GatewayUnavailableError extends AppError {
  public readonly result: GatewayCallResult;

  constructor(subsystem: string, result: GatewayCallResult) {
    const reason = result.status === 'exhausted'
      ? `retries exhausted after ${result.attempts} attempts`
      : 'upstream rejected the request';
    super(`Model gateway "${subsystem}" unavailable: ${reason}`, 503, ErrorCodes.GATEWAY_UNAVAILABLE, {
      subsystem,
      status: result.status,
      attempts: result.attempts,
      latencyMs: result.latencyMs,
      ...(result.error?.httpStatus ? { httpStatus: result.error.httpStatus } : {}),
    });
    this.name = 'GatewayUnavailableError';
    this.result = result;
  }
}

export interface ViolationDetail {
  layer: SafetyLayer;
  category: string;
  severity: Severity;
  reason?: string;
  suggestion?: string;
}

export interface ViolationSummary {
  severity: Severity;
  categories: string[];
  count: number;
  /** Present only when violation details are switched on; never carries flagged text. */
  violations?: ViolationDetail[];
}

export interface SafetyRejectionOptions {
  includeViolationDetails?: boolean;
}

export class SafetyRejection extends AppError {
  public readonly summary: ViolationSummary;

  constructor(verdict: SafetyVerdict, options: SafetyRejectionOptions = {}) {
    const summary: ViolationSummary = {
      severity: verdict.severity,
      categories: [...new Set(verdict.violations.map((v) => v.category))],
      count: verdict.violations.length,
    };
    if (options.includeViolationDetails) {
      summary.violations = verdict.violations.map((v) => ({
        layer: v.layer,
        category: v.category,
        severity: v.severity,
        ...(v.reason ? { reason: v.reason } : {}),
        ...(v.suggestion ? { suggestion: v.suggestion } : {}),
      }));
    }
    super('Generated content was rejected by the safety guardrail', 422, ErrorCodes.SAFETY_REJECTION, { ...summary });
    this.name = 'SafetyRejection';
    this.summary = summary;
  }
}

export interface SchemaIssue {
  path: string;
  message: string;
}

export class SchemaMismatchError extends AppError {
  public readonly issues: SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    super('Model output does not match the expected schema', 502, ErrorCodes.SCHEMA_MISMATCH, { issues });
    this.name = 'SchemaMismatchError';
    this.issues = issues;
  }
}

export class BackpressureError extends AppError {
  constructor(message = 'Too many model calls in flight, retry later') {
    super(message, 429, ErrorCodes.BACKPRESSURE);
    this.name = 'BackpressureError';
  }
}
