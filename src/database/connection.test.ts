import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { HUB_TABLES, missingTables } from './connection';

describe('database connection', () => {
  it('should list exactly the tables schema.sql creates', () => {
    const schema = fs.readFileSync(path.join(__dirname, 'schema.sql'), 'utf-8');
    const created = [...schema.matchAll(/CREATE TABLE IF NOT EXISTS (\w+)/g)].map((match) => match[1]);
    expect(created.sort()).toEqual([...HUB_TABLES]);
  });

  it('should report the hub tables a database lacks', () => {
    expect(missingTables([...HUB_TABLES, 'other'])).toEqual([]);
    expect(missingTables(['pools', 'user_loans'])).toEqual([
      'f_token_balances',
      'loan_types',
      'price_feeds',
      'reward_epochs',
      'user_pool_rewards',
    ]);
  });
});
