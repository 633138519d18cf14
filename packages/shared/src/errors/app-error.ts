import { z } from 'zod/v4';

export const SEVERITY = ['fatal', 'error', 'warning', 'info'] as const;
export type Severity = (typeof SEVERITY)[number];

export const AppErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  severity: z.enum(SEVERITY),
  context: z.record(z.string(), z.unknown()).optional(),
  timestamp: z.iso.datetime(),
  cause: z.string().optional(),
});

export type AppErrorDTO = z.infer<typeof AppErrorSchema>;

export function toError(cause: unknown): Error {
  if (cause instanceof Error) {
    return cause;
  }
  return new Error(String(cause));
}

export class AppError {
  readonly code: string;
  readonly message: string;
  readonly severity: Severity;
  readonly context: Record<string, unknown>;
  readonly timestamp: string;
  readonly cause?: string;

  private constructor(params: {
    code: string;
    message: string;
    severity: Severity;
    context?: Record<string, unknown>;
    cause?: Error;
    timestamp?: string;
  }) {
    this.code = params.code;
    this.message = params.message;
    this.severity = params.severity;
    this.context = params.context ?? {};
    this.timestamp = params.timestamp ?? new Date().toISOString();
    this.cause = params.cause?.message;
  }

  static create(
    code: string,
    message: string,
    severity: Severity = 'error',
    context?: Record<string, unknown>,
    cause?: Error,
  ): AppError {
    return new AppError({ code, message, severity, context, cause });
  }

  /**
   * Wraps anything caught from a library call (better-sqlite3, fs, express).
   */
  static fromUnknown(
    code: string,
    message: string,
    cause: unknown,
    context?: Record<string, unknown>,
  ): AppError {
    return new AppError({ code, message, severity: 'error', context, cause: toError(cause) });
  }

  toDTO(): AppErrorDTO {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause,
    };
  }
}
