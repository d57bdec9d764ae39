/**
 * Lending Hub - PostgreSQL Repository
 *
 * Each action loads the pools, the loan types, the loans and accounts it
 * touches and the epoch state, then writes everything back in one transaction.
 */

import { Pool as PgPool, PoolClient } from 'pg';
import { z } from 'zod';
import { toJson } from '../shared/codec';
import { AccountId, LoanId, LoanType, LoanTypeId, Pool, PoolId, UserLoan, UserPoolRewards } from '../shared/types';
import { HubSnapshot, LendingRepository, LoadScope } from '../modules/loan-manager/types';
import { createRewardEpochState } from '../modules/rewards';
import {
  AccountRewardsRecordSchema,
  LoanTypeRecordSchema,
  PoolRecordSchema,
  RewardEpochsRecordSchema,
  UserLoanRecordSchema,
} from './records';

const EPOCHS_ROW_ID = 1;

interface DataRow {
  data: unknown;
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, table: string, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`[Repository] Corrupt ${table} record: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }
  return parsed.data;
}

// ============================================================================
// REPOSITORY CLASS
// ============================================================================

export class PostgresLendingRepository implements LendingRepository {
  constructor(private pool: PgPool) {}

  async load(scope: LoadScope): Promise<HubSnapshot> {
    const [pools, loanTypes, loans, rewards, epochs] = await Promise.all([
      this.pool.query<DataRow>('SELECT data FROM pools'),
      this.pool.query<DataRow>('SELECT data FROM loan_types'),
      this.pool.query<DataRow>('SELECT data FROM user_loans WHERE loan_id = ANY($1)', [scope.loanIds]),
      this.pool.query<DataRow & { account_id: string }>(
        'SELECT account_id, data FROM user_pool_rewards WHERE account_id = ANY($1)',
        [scope.accountIds]
      ),
      this.pool.query<DataRow>('SELECT data FROM reward_epochs WHERE id = $1', [EPOCHS_ROW_ID]),
    ]);

    const snapshot: HubSnapshot = {
      pools: new Map<PoolId, Pool>(),
      loanTypes: new Map<LoanTypeId, LoanType>(),
      loans: new Map<LoanId, UserLoan>(),
      userPoolRewards: new Map<AccountId, Map<PoolId, UserPoolRewards>>(),
      rewardEpochs: createRewardEpochState(),
    };

    for (const row of pools.rows) {
      const pool = decode(PoolRecordSchema, 'pools', row.data);
      snapshot.pools.set(pool.poolId, pool);
    }
    for (const row of loanTypes.rows) {
      const loanType = decode(LoanTypeRecordSchema, 'loan_types', row.data);
      snapshot.loanTypes.set(loanType.loanTypeId, loanType);
    }
    for (const row of loans.rows) {
      const loan = decode(UserLoanRecordSchema, 'user_loans', row.data);
      snapshot.loans.set(loan.loanId, loan);
    }
    for (const row of rewards.rows) {
      snapshot.userPoolRewards.set(row.account_id, decode(AccountRewardsRecordSchema, 'user_pool_rewards', row.data));
    }
    const epochRow = epochs.rows[0];
    if (epochRow) {
      snapshot.rewardEpochs = decode(RewardEpochsRecordSchema, 'reward_epochs', epochRow.data);
    }

    return snapshot;
  }

  async commit(snapshot: HubSnapshot, deletedLoanIds: LoanId[]): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await this.writeSnapshot(client, snapshot);
      if (deletedLoanIds.length > 0) {
        await client.query('DELETE FROM user_loans WHERE loan_id = ANY($1)', [deletedLoanIds]);
      }
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  // ==========================================================================
  // UPSERTS
  // ==========================================================================

  private async writeSnapshot(client: PoolClient, snapshot: HubSnapshot): Promise<void> {
    for (const [poolId, pool] of snapshot.pools) {
      await client.query(
        `INSERT INTO pools (pool_id, data) VALUES ($1, $2)
         ON CONFLICT (pool_id) DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
        [poolId, JSON.stringify(toJson(pool))]
      );
    }

    for (const [loanTypeId, loanType] of snapshot.loanTypes) {
      await client.query(
        `INSERT INTO loan_types (loan_type_id, data) VALUES ($1, $2)
         ON CONFLICT (loan_type_id) DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
        [loanTypeId, JSON.stringify(toJson(loanType))]
      );
    }

    for (const [loanId, loan] of snapshot.loans) {
      await client.query(
        `INSERT INTO user_loans (loan_id, account_id, data) VALUES ($1, $2, $3)
         ON CONFLICT (loan_id) DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
        [loanId, loan.accountId, JSON.stringify(toJson(loan))]
      );
    }

    for (const [accountId, rewards] of snapshot.userPoolRewards) {
      await client.query(
        `INSERT INTO user_pool_rewards (account_id, data) VALUES ($1, $2)
         ON CONFLICT (account_id) DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
        [accountId, JSON.stringify(toJson(rewards))]
      );
    }

    await client.query(
      `INSERT INTO reward_epochs (id, data) VALUES ($1, $2)
       ON CONFLICT (id) DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
      [EPOCHS_ROW_ID, JSON.stringify(toJson(snapshot.rewardEpochs))]
    );
  }
}
