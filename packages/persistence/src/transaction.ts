/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Works with any DrizzleORM PostgreSQL driver (postgres.js in production, PGlite in tests).
 */

import type { PgDatabase } from 'drizzle-orm/pg-core';

/**
 * Any DrizzleORM PostgreSQL database or transaction, whatever its driver and schema.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyPgDatabase = PgDatabase<any, any, any>;

/**
 * Transaction context passed to repository operations.
 * Contains the database instance scoped to the current transaction.
 */
export interface TransactionContext {
	/** DrizzleORM database instance scoped to this transaction */
	readonly db: AnyPgDatabase;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager {
	/**
	 * Execute a function within a database transaction.
	 * If the function throws, the transaction is rolled back.
	 * If the function returns, the transaction is committed.
	 * Called with an enclosing transaction context, it opens a savepoint instead.
	 *
	 * @throws Re-throws any error from the function after rolling back
	 */
	inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>, outer?: TransactionContext): Promise<T>;

	/**
	 * Get the database instance (for non-transactional queries).
	 */
	readonly db: AnyPgDatabase;
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 */
export function createTransactionManager(db: AnyPgDatabase): TransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>, outer?: TransactionContext): Promise<T> {
			return resolveDb(db, outer).transaction(async (tx) => {
				return fn({ db: tx });
			});
		},
	};
}

/**
 * Resolve the database instance from a transaction context or fall back to default.
 */
export function resolveDb(defaultDb: AnyPgDatabase, tx?: TransactionContext): AnyPgDatabase {
	return tx?.db ?? defaultDb;
}
