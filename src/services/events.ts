/**
 * Verdict Publisher
 *
 * Writes one audit row per verification run to Postgres so operators can
 * see which reboots and shutdowns were cleared or refused.
 */

import pg from 'pg';
import type { Config } from '../config.js';
import type { Operation } from '../types.js';
import type { Result, Severity } from '../verification/result.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

const { Pool } = pg;

export type VerificationEventType = 'VERIFY_PASSED' | 'VERIFY_FAILED';

export interface VerificationEvent {
  eventType: VerificationEventType;
  operation: Operation;
  severity: Severity;
  units: string[];
  message: string;
  details?: Record<string, unknown>;
}

export function buildVerdictEvent(operation: Operation, units: readonly string[], result: Result): VerificationEvent {
  const failures = result.partialResults.filter(p => p.severity === 'FAIL').length;
  return {
    eventType: result.success ? 'VERIFY_PASSED' : 'VERIFY_FAILED',
    operation,
    severity: result.severity,
    units: [...units],
    message: result.success
      ? `Safe to ${operation} ${units.join(', ')}`
      : `Not safe to ${operation} ${units.join(', ')}: ${failures} failure(s)`,
    details: { partials: result.partialResults },
  };
}

/**
 * Event publisher that writes directly to Postgres.
 * Never throws: a lost audit row must not change the verdict.
 */
export class EventPublisher {
  private pool: pg.Pool | null = null;
  private postgresAvailable: boolean = true;

  constructor(config: Pick<Config, 'postgresUrl'>) {
    this.initPostgres(config);
  }

  private initPostgres(config: Pick<Config, 'postgresUrl'>): void {
    if (!config.postgresUrl) {
      log('[Events] No Postgres URL configured, verdict publishing disabled');
      this.postgresAvailable = false;
      return;
    }

    try {
      this.pool = new Pool({
        connectionString: config.postgresUrl,
        max: 2,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      });

      this.pool.on('error', (err) => {
        log(`[Events] Postgres pool error: ${err.message}`);
        this.postgresAvailable = false;
      });
    } catch (err) {
      log(`[Events] Failed to initialize Postgres: ${errorMessage(err)}`);
      this.postgresAvailable = false;
    }
  }

  async publish(event: VerificationEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) {
      log(`[Events] Postgres unavailable, skipping event: ${event.eventType}`);
      return;
    }

    try {
      await this.pool.query(
        `INSERT INTO verification_events
         (event_type, operation, severity, units, message, details)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          event.eventType,
          event.operation,
          event.severity,
          event.units,
          event.message,
          event.details ? JSON.stringify(event.details) : null,
        ],
      );

      log(`[Events] Published ${event.eventType}: ${event.message}`);
    } catch (err) {
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] verification_events table does not exist, skipping event publishing');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to publish event: ${errorMessage(err)}`);
      }
    }
  }

  async publishVerdict(operation: Operation, units: readonly string[], result: Result): Promise<void> {
    await this.publish(buildVerdictEvent(operation, units, result));
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
