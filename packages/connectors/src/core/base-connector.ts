import { z } from 'zod';
import { getLogger, getMetrics, type IMetrics, type Logger } from '@driftgate/core';
import { ValidationError } from '../errors/index.js';

/**
 * Dependencies shared by every connector
 */
export interface ConnectorOptions {
  logger?: Logger;
  metrics?: IMetrics;
}

export interface HealthCheck {
  name: string;
  status: 'pass' | 'fail';
  durationMs: number;
  error?: string;
}

export interface HealthStatus {
  healthy: boolean;
  timestamp: string;
  connector: string;
  checks: HealthCheck[];
}

/**
 * The fields of an axios error the connectors read
 */
const HttpFailureSchema = z.object({
  message: z.string().optional(),
  code: z.string().optional(),
  response: z
    .object({
      status: z.number(),
    })
    .optional(),
});

export interface HttpFailure {
  message: string;
  code?: string;
  status?: number;
}

export function describeHttpFailure(error: unknown): HttpFailure {
  const parsed = HttpFailureSchema.safeParse(error);
  if (!parsed.success) {
    return { message: String(error) };
  }
  return {
    message: parsed.data.message ?? String(error),
    code: parsed.data.code,
    status: parsed.data.response?.status,
  };
}

/**
 * BaseConnector provides the shared plumbing for outbound HTTP connectors:
 * injected logger and metrics, config validation and a timed health check.
 *
 * Connectors extending BaseConnector must implement:
 * - name
 * - healthCheck()
 */
export abstract class BaseConnector {
  abstract readonly name: string;

  protected readonly logger: Logger;
  protected readonly metrics: IMetrics;

  constructor(options: ConnectorOptions = {}, component = 'connector') {
    this.logger = options.logger ?? getLogger(component);
    this.metrics = options.metrics ?? getMetrics();
  }

  abstract healthCheck(): Promise<HealthStatus>;

  /**
   * Validate connector configuration, wrapping zod failures.
   *
   * @throws {ValidationError} If the configuration does not match the schema
   */
  protected parseConfig<T>(schema: z.ZodType<T>, config: unknown): T {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid ${this.name} configuration`,
        this.name,
        parsed.error.errors.map((e) => ({
          field: e.path.join('.'),
          message: e.message,
        }))
      );
    }
    return parsed.data;
  }

  /**
   * Run one named check and record how long it took
   */
  protected async runCheck(name: string, check: () => Promise<unknown>): Promise<HealthCheck> {
    const start = Date.now();
    try {
      await check();
      return { name, status: 'pass', durationMs: Date.now() - start };
    } catch (error) {
      return {
        name,
        status: 'fail',
        durationMs: Date.now() - start,
        error: describeHttpFailure(error).message,
      };
    }
  }

  protected healthStatus(checks: HealthCheck[]): HealthStatus {
    return {
      healthy: checks.every((check) => check.status === 'pass'),
      timestamp: new Date().toISOString(),
      connector: this.name,
      checks,
    };
  }
}
