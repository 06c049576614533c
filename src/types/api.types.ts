export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  TEMPLATE_NOT_FOUND: 'TEMPLATE_NOT_FOUND',
  GATEWAY_TRANSIENT: 'GATEWAY_TRANSIENT',
  GATEWAY_UNAVAILABLE: 'GATEWAY_UNAVAILABLE',
  SAFETY_REJECTION: 'SAFETY_REJECTION',
  SCHEMA_MISMATCH: 'SCHEMA_MISMATCH',
  BACKPRESSURE: 'BACKPRESSURE',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
  timestamp: string;
  requestId?: string;
}
