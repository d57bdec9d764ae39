/**
 * Lending Hub - Price Feeds and Receipt Token Balances
 */

import { Pool as PgPool } from 'pg';
import { PoolId, PriceFeed } from '../shared/types';
import { PriceOracle, ReceiptTokenLedger } from '../modules/loan-manager/types';
import { PoolError } from '../modules/pools';

export class PostgresPriceOracle implements PriceOracle {
  constructor(private pool: PgPool) {}

  async getPriceFeed(poolId: PoolId): Promise<PriceFeed> {
    const result = await this.pool.query<{ price: string; decimals: number }>(
      'SELECT price::text AS price, decimals FROM price_feeds WHERE pool_id = $1',
      [poolId]
    );
    const row = result.rows[0];
    if (!row) {
      throw new PoolError('PriceFeedUnavailable', `No price feed for pool ${poolId}`, { poolId });
    }
    return { price: BigInt(row.price), decimals: row.decimals };
  }

  async setPriceFeed(poolId: PoolId, feed: PriceFeed): Promise<void> {
    await this.pool.query(
      `INSERT INTO price_feeds (pool_id, price, decimals) VALUES ($1, $2, $3)
       ON CONFLICT (pool_id) DO UPDATE SET price = EXCLUDED.price, decimals = EXCLUDED.decimals, updated_at = NOW()`,
      [poolId, feed.price.toString(), feed.decimals]
    );
  }
}

export class PostgresReceiptTokenLedger implements ReceiptTokenLedger {
  constructor(private pool: PgPool) {}

  async balanceOf(poolId: PoolId, account: string): Promise<bigint> {
    const result = await this.pool.query<{ balance: string }>(
      'SELECT balance::text AS balance FROM f_token_balances WHERE pool_id = $1 AND account = $2',
      [poolId, account]
    );
    return BigInt(result.rows[0]?.balance ?? '0');
  }

  async mint(poolId: PoolId, account: string, fAmount: bigint): Promise<void> {
    await this.pool.query(
      `INSERT INTO f_token_balances (pool_id, account, balance) VALUES ($1, $2, $3)
       ON CONFLICT (pool_id, account) DO UPDATE SET balance = f_token_balances.balance + EXCLUDED.balance`,
      [poolId, account, fAmount.toString()]
    );
  }

  async burn(poolId: PoolId, account: string, fAmount: bigint): Promise<void> {
    const result = await this.pool.query(
      `UPDATE f_token_balances SET balance = balance - $3
       WHERE pool_id = $1 AND account = $2 AND balance >= $3`,
      [poolId, account, fAmount.toString()]
    );
    if (result.rowCount !== 1) {
      throw new Error(`[Ledger] Cannot burn ${fAmount} f-tokens of ${account} in pool ${poolId}`);
    }
  }
}
