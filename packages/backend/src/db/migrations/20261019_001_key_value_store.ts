import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // kv_records: current record per (namespace, key)
  await knex.schema.createTable('kv_records', (t) => {
    t.string('namespace', 191).notNullable();
    t.string('record_key', 191).notNullable();
    t.json('value').notNullable();
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.primary(['namespace', 'record_key']);
  });

  // kv_log: append-only sequences (audit trail)
  await knex.schema.createTable('kv_log', (t) => {
    t.bigIncrements('id').primary();
    t.string('namespace', 191).notNullable();
    t.string('record_key', 191).notNullable();
    t.json('entry').notNullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.index(['namespace', 'record_key', 'id'], 'idx_kv_log_key');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('kv_log');
  await knex.schema.dropTableIfExists('kv_records');
}
