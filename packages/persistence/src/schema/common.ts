/**
 * Common Schema Definitions
 *
 * Identifier columns shared by entity tables. Spread one of them into a
 * `pgTable` column map so the table satisfies {@link EntityTable}.
 *
 * @example
 * ```typescript
 * export const users = pgTable('users', {
 *     ...serialIdColumns,
 *     email: varchar('email', { length: 255 }).notNull(),
 * });
 * ```
 */

import { bigserial } from 'drizzle-orm/pg-core';

/**
 * Database-assigned 64-bit identifier, read back as a JS number.
 * Safe up to 2^53 - 1, which covers any realistic sequence.
 */
export const serialIdColumns = {
	id: bigserial('id', { mode: 'number' }).primaryKey(),
};

/**
 * Database-assigned 64-bit identifier, read back as a bigint.
 */
export const bigintIdColumns = {
	id: bigserial('id', { mode: 'bigint' }).primaryKey(),
};
