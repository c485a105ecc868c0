/**
 * @tabula/persistence
 *
 * Generic entity repositories for PostgreSQL using DrizzleORM.
 *
 * Key components:
 * - Database connection and configuration
 * - Transaction management
 * - Entity definitions (table + row mapping)
 * - Generic entity repository
 * - Schema DDL for repository-managed tables
 *
 * @example
 * ```typescript
 * import { pgTable, varchar } from 'drizzle-orm/pg-core';
 * import { z } from 'zod/v4';
 * import {
 *     createDatabase,
 *     createEntityRepository,
 *     createTransactionManager,
 *     defineEntity,
 *     Identifier,
 *     loadDatabaseConfig,
 *     serialIdColumns,
 * } from '@tabula/persistence';
 *
 * const users = pgTable('users', {
 *     ...serialIdColumns,
 *     email: varchar('email', { length: 255 }).notNull(),
 * });
 * const User = defineEntity(users, { id: Identifier.number, fields: z.object({ email: z.string() }) });
 *
 * const database = createDatabase(loadDatabaseConfig());
 * const transactionManager = createTransactionManager(database.db);
 * const usersRepository = createEntityRepository(User, database.db);
 *
 * const id = await transactionManager.inTransaction(async (tx) => {
 *     await usersRepository.create(tx);
 *     return usersRepository.save({ email: 'kn@example.com' }, tx);
 * });
 * ```
 */

// Database connection
export { createDatabase, createMigrationDatabase, type Database, type DatabaseConfig } from './connection.js';
export { loadDatabaseConfig, DatabaseEnvSchema } from './config.js';

// Transaction management
export {
	createTransactionManager,
	resolveDb,
	type AnyPgDatabase,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';

// Entity definitions
export {
	defineEntity,
	Identifier,
	type EntityDefinition,
	type EntityMapping,
	type EntityTable,
	type FieldsOf,
	type IdOf,
	type NewRow,
	type PersistedRow,
	type PersistedRowOf,
	type Row,
	type RowId,
	type RowOf,
} from './entity.js';

// Repositories
export { type Repository, type PagedResult, createPagedResult } from './repository.js';
export {
	createEntityRepository,
	type EntityRepository,
	type EntityRepositoryOptions,
} from './entity-repository.js';
export { EntityNotFoundError } from './errors.js';

// Schema
export { serialIdColumns, bigintIdColumns } from './schema/common.js';
export { createTableStatement, dropTableStatement } from './schema/ddl.js';
