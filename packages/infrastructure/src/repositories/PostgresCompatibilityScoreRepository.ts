/**
 * @fileoverview PostgreSQL Compatibility Score Repository
 *
 * Implements the CompatibilityScoreRepository port on top of the
 * `compatibility_scores` table (db/migrations/002_compatibility_scores.sql).
 *
 * The complete score record is stored as JSONB and re-validated with the
 * shared zod schema on the way out; the remaining columns exist for the
 * pair lookups and the statistics queries.
 *
 * @module @pairmatch/infrastructure/repositories/postgres-compatibility-score-repository
 *
 * @example
 * ```typescript
 * const repository = new PostgresCompatibilityScoreRepository({
 *   connectionString: config.database.url,
 * });
 *
 * const latest = await repository.findByPair(donorPairId, recipientPairId);
 * ```
 */

import pg from 'pg';
import { createLogger, DatabaseOperationError } from '@pairmatch/core';
import {
  CompatibilityScoreSchema,
  RiskAssessmentSchema,
  ScoringMethodSchema,
  type CompatibilityScore,
  type RiskAssessment,
  type ScoringMethod,
} from '@pairmatch/types';
import type { CompatibilityScoreRepository } from '@pairmatch/application';
import type { z } from 'zod';

const logger = createLogger({ name: 'postgres-compatibility-score-repository' });

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface PostgresCompatibilityScoreRepositoryConfig {
  connectionString: string;
  maxConnections?: number;
  /** Defaults to compatibility_scores */
  tableName?: string;
  /** Pre-built pool; takes precedence over connectionString */
  pool?: pg.Pool;
}

// ============================================================================
// ROW TYPES
// ============================================================================

interface ScoreRow {
  score_id: string;
  payload: unknown;
}

interface GroupCountRow {
  key: string;
  count: number;
}

interface CountRow {
  count: number;
}

// ============================================================================
// REPOSITORY
// ============================================================================

export class PostgresCompatibilityScoreRepository implements CompatibilityScoreRepository {
  private readonly pool: pg.Pool;
  private readonly tableName: string;

  constructor(config: PostgresCompatibilityScoreRepositoryConfig) {
    this.pool =
      config.pool ??
      new pg.Pool({
        connectionString: config.connectionString,
        max: config.maxConnections ?? 10,
      });
    this.tableName = config.tableName ?? 'compatibility_scores';

    logger.info({ tableName: this.tableName }, 'PostgresCompatibilityScoreRepository initialized');
  }

  // ==========================================================================
  // LOOKUPS
  // ==========================================================================

  async findByPair(
    donorPairId: string,
    recipientPairId: string
  ): Promise<CompatibilityScore | null> {
    const rows = await this.select(
      'findByPair',
      `SELECT score_id, payload FROM ${this.tableName}
       WHERE donor_pair_id = $1 AND recipient_pair_id = $2
       ORDER BY calculated_at DESC
       LIMIT 1`,
      [donorPairId, recipientPairId]
    );

    const [row] = rows;
    return row ? this.rowToScore(row) : null;
  }

  async findByDonorPair(donorPairId: string): Promise<CompatibilityScore[]> {
    const rows = await this.select(
      'findByDonorPair',
      `SELECT score_id, payload FROM ${this.tableName}
       WHERE donor_pair_id = $1
       ORDER BY overall_score DESC`,
      [donorPairId]
    );
    return rows.map((row) => this.rowToScore(row));
  }

  async findByRecipientPair(recipientPairId: string): Promise<CompatibilityScore[]> {
    const rows = await this.select(
      'findByRecipientPair',
      `SELECT score_id, payload FROM ${this.tableName}
       WHERE recipient_pair_id = $1
       ORDER BY overall_score DESC`,
      [recipientPairId]
    );
    return rows.map((row) => this.rowToScore(row));
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  async save(score: CompatibilityScore): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO ${this.tableName}
         (score_id, donor_pair_id, recipient_pair_id, method, risk_assessment,
          overall_score, recommendation, calculated_at, payload)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (score_id) DO NOTHING`,
        [
          score.scoreId,
          score.donorPairId,
          score.recipientPairId,
          score.method,
          score.riskAssessment,
          score.overallScore,
          score.recommendation,
          score.calculatedAt,
          JSON.stringify(score),
        ]
      );
    } catch (error) {
      logger.error({ err: error, scoreId: score.scoreId }, 'Failed to save compatibility score');
      throw toDatabaseError('save', error);
    }
  }

  // ==========================================================================
  // STATISTICS
  // ==========================================================================

  async countByMethod(): Promise<Partial<Record<ScoringMethod, number>>> {
    const rows = await this.groupCount('method');
    return tally(rows, ScoringMethodSchema);
  }

  async countByRiskAssessment(): Promise<Partial<Record<RiskAssessment, number>>> {
    const rows = await this.groupCount('risk_assessment');
    return tally(rows, RiskAssessmentSchema);
  }

  async countSince(since: Date): Promise<number> {
    try {
      const result = await this.pool.query<CountRow>(
        `SELECT COUNT(*)::int AS count FROM ${this.tableName} WHERE calculated_at >= $1`,
        [since.toISOString()]
      );
      return result.rows[0]?.count ?? 0;
    } catch (error) {
      logger.error({ err: error }, 'Failed to count recent compatibility scores');
      throw toDatabaseError('countSince', error);
    }
  }

  async count(): Promise<number> {
    try {
      const result = await this.pool.query<CountRow>(
        `SELECT COUNT(*)::int AS count FROM ${this.tableName}`
      );
      return result.rows[0]?.count ?? 0;
    } catch (error) {
      logger.error({ err: error }, 'Failed to count compatibility scores');
      throw toDatabaseError('count', error);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async select(operation: string, sql: string, params: unknown[]): Promise<ScoreRow[]> {
    try {
      const result = await this.pool.query<ScoreRow>(sql, params);
      return result.rows;
    } catch (error) {
      logger.error({ err: error, operation }, 'Compatibility score query failed');
      throw toDatabaseError(operation, error);
    }
  }

  private async groupCount(column: 'method' | 'risk_assessment'): Promise<GroupCountRow[]> {
    try {
      const result = await this.pool.query<GroupCountRow>(
        `SELECT ${column} AS key, COUNT(*)::int AS count FROM ${this.tableName} GROUP BY ${column}`
      );
      return result.rows;
    } catch (error) {
      logger.error({ err: error, column }, 'Failed to group compatibility scores');
      throw toDatabaseError(`countBy:${column}`, error);
    }
  }

  private rowToScore(row: ScoreRow): CompatibilityScore {
    const parsed = CompatibilityScoreSchema.safeParse(row.payload);
    if (!parsed.success) {
      logger.error(
        { scoreId: row.score_id, issues: parsed.error.issues.length },
        'Stored compatibility score failed validation'
      );
      throw new DatabaseOperationError('read', `Stored score ${row.score_id} is malformed`);
    }
    return parsed.data;
  }
}

function toDatabaseError(operation: string, error: unknown): DatabaseOperationError {
  return new DatabaseOperationError(
    operation,
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error : undefined
  );
}

/**
 * Fold GROUP BY rows into a keyed tally, skipping values the schema rejects
 */
function tally<TKey extends string>(
  rows: readonly GroupCountRow[],
  keySchema: z.ZodType<TKey, z.ZodTypeDef, unknown>
): Partial<Record<TKey, number>> {
  const counts: Partial<Record<TKey, number>> = {};
  for (const row of rows) {
    const key = keySchema.safeParse(row.key);
    if (key.success) {
      counts[key.data] = (counts[key.data] ?? 0) + row.count;
    }
  }
  return counts;
}
