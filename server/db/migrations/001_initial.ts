import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // price_bars
  await db.schema
    .createTable('price_bars')
    .ifNotExists()
    .addColumn('instrument', 'varchar(40)', (col) => col.notNull())
    .addColumn('bar_date', 'varchar(10)', (col) => col.notNull())
    .addColumn('open', 'double precision', (col) => col.notNull())
    .addColumn('high', 'double precision', (col) => col.notNull())
    .addColumn('low', 'double precision', (col) => col.notNull())
    .addColumn('close', 'double precision', (col) => col.notNull())
    .addColumn('volume', 'double precision', (col) => col.notNull().defaultTo(0))
    .addPrimaryKeyConstraint('price_bars_pkey', ['instrument', 'bar_date'])
    .execute();

  // ema_cache_entries
  await db.schema
    .createTable('ema_cache_entries')
    .ifNotExists()
    .addColumn('instrument', 'varchar(40)', (col) => col.primaryKey())
    .addColumn('period', 'integer', (col) => col.notNull())
    .addColumn('last_close', 'double precision', (col) => col.notNull())
    .addColumn('ema_value', 'double precision')
    .addColumn('last_bar_date', 'varchar(10)', (col) => col.notNull())
    .addColumn('last_update_timestamp', 'varchar(40)', (col) => col.notNull())
    .addColumn('data_point_count', 'integer', (col) => col.notNull())
    .execute();

  // update_runs
  await db.schema
    .createTable('update_runs')
    .ifNotExists()
    .addColumn('run_id', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('trade_date', 'varchar(10)', (col) => col.notNull())
    .addColumn('status', 'varchar(20)', (col) => col.notNull())
    .addColumn('total_instruments', 'integer', (col) => col.notNull())
    .addColumn('started_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('finished_at', 'varchar(40)')
    .execute();

  await db.schema
    .createIndex('idx_update_runs_status_started')
    .ifNotExists()
    .on('update_runs')
    .columns(['status', 'started_at'])
    .execute();

  // ledger_entries
  await db.schema
    .createTable('ledger_entries')
    .ifNotExists()
    .addColumn('run_id', 'varchar(64)', (col) => col.notNull().references('update_runs.run_id'))
    .addColumn('instrument', 'varchar(40)', (col) => col.notNull())
    .addColumn('status', 'varchar(20)', (col) => col.notNull())
    .addColumn('attempt_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('last_error', 'text')
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .addPrimaryKeyConstraint('ledger_entries_pkey', ['run_id', 'instrument'])
    .execute();

  // run_marker: a single row, id = 1
  await db.schema
    .createTable('run_marker')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey())
    .addColumn('last_success_date', 'varchar(10)')
    .addColumn('cutoff_time', 'varchar(5)', (col) => col.notNull())
    .addColumn('lock_owner', 'varchar(120)')
    .addColumn('lock_expires_at', 'varchar(40)')
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('run_marker').ifExists().execute();
  await db.schema.dropTable('ledger_entries').ifExists().execute();
  await db.schema.dropTable('update_runs').ifExists().execute();
  await db.schema.dropTable('ema_cache_entries').ifExists().execute();
  await db.schema.dropTable('price_bars').ifExists().execute();
}
