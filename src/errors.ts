import { ZodError } from 'zod';

export interface ProbeErrorOptions {
  cause?: unknown;
  metadata?: Record<string, unknown>;
}

export class ProbeError extends Error {
  public readonly metadata: Record<string, unknown>;

  constructor(message: string, options: ProbeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.metadata = options.metadata ?? {};
  }
}

/**
 * Raised by a broker channel when the broker refuses an operation at channel
 * level, typically a passive declare of a queue nobody has created yet.
 */
export class BrokerChannelError extends ProbeError {
  public readonly queue: string;

  public readonly replyCode: number | null;

  constructor(queue: string, replyCode: number | null, options: ProbeErrorOptions = {}) {
    super(`Broker refused channel operation on queue ${queue}`, {
      ...options,
      metadata: {
        ...(options.metadata ?? {}),
        queue,
        replyCode
      }
    });
    this.queue = queue;
    this.replyCode = replyCode;
  }
}

export class InvalidTaskStatusError extends ProbeError {
  public readonly status: string;

  constructor(status: string) {
    super(`Invalid task status: ${status}`, { metadata: { status } });
    this.status = status;
  }
}

export class UnknownRouteError extends ProbeError {
  public readonly exchange: string;

  public readonly routingKey: string;

  constructor(exchange: string, routingKey: string) {
    super(`No queue is bound to exchange "${exchange}" with routing key "${routingKey}"`, {
      metadata: { exchange, routingKey }
    });
    this.exchange = exchange;
    this.routingKey = routingKey;
  }
}

export class InspectionReplyError extends ProbeError {
  constructor(method: string, options: ProbeErrorOptions = {}) {
    super(`Malformed worker reply to ${method}`, {
      ...options,
      metadata: {
        ...(options.metadata ?? {}),
        method
      }
    });
  }
}

export class UnsupportedBrokerError extends ProbeError {
  constructor(protocol: string) {
    super(`Unsupported broker protocol: ${protocol}`, { metadata: { protocol } });
  }
}

export class UnsupportedInspectionError extends ProbeError {
  constructor(label: string) {
    super(`Worker inspection is not available for broker ${label}`, { metadata: { broker: label } });
  }
}

export class ProcConfigurationError extends ProbeError {}

export class ConfigFileNotFoundError extends ProbeError {
  constructor(path: string, options: ProbeErrorOptions = {}) {
    super(`Config file not found: ${path}`, {
      ...options,
      metadata: {
        ...(options.metadata ?? {}),
        path
      }
    });
  }
}

export class ConfigParseError extends ProbeError {}

export class ConfigValidationError extends ProbeError {
  public readonly issues: string[];

  constructor(issues: string[], options: ProbeErrorOptions = {}) {
    super(`Config validation failed: ${issues.join('; ')}`, {
      ...options,
      metadata: {
        ...(options.metadata ?? {}),
        issues
      }
    });
    this.issues = issues;
  }
}

export const extractIssuesFromZodError = (error: ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack
    };
  }

  return { message: String(error) };
};
