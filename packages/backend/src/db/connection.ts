import knex, { type Knex } from 'knex';
import type { DischargeConfig } from '../config.js';

export function createDb(dbConfig: DischargeConfig['db']): Knex {
  return knex({
    client: 'mysql2',
    connection: {
      host: dbConfig.host,
      port: dbConfig.port,
      user: dbConfig.user,
      password: dbConfig.password,
      database: dbConfig.database,
      timezone: 'UTC',
    },
    pool: {
      min: 0,
      max: 10,
    },
  });
}
