/**
 * Entity Repository
 *
 * Generic repository over an entity definition. All SQL is built by DrizzleORM;
 * this layer decides insert vs update, turns absence into `undefined` or
 * {@link EntityNotFoundError}, and keeps reads ordered by identifier.
 */

import { asc, eq, inArray, sql } from 'drizzle-orm';
import { createChildLogger, getLogger, type Logger } from '@tabula/logging';
import type { EntityDefinition, EntityTable, PersistedRow, Row, RowId } from './entity.js';
import { EntityNotFoundError } from './errors.js';
import { createPagedResult, type PagedResult, type Repository } from './repository.js';
import { createTableStatement, dropTableStatement } from './schema/ddl.js';
import { resolveDb, type AnyPgDatabase, type TransactionContext } from './transaction.js';

export interface EntityRepositoryOptions {
	/** Parent logger; the default logger when omitted */
	readonly logger?: Logger;
}

export interface EntityRepository<
	TTable extends EntityTable,
	TId extends RowId,
	TFields extends Record<string, unknown>,
> extends Repository<TId, TFields> {
	readonly entity: EntityDefinition<TTable, TId, TFields>;
}

/**
 * Create a repository for an entity.
 *
 * @param defaultDb - Database used when an operation gets no transaction context
 *
 * @example
 * ```typescript
 * const usersRepository = createEntityRepository(User, database.db);
 *
 * await transactionManager.inTransaction(async (tx) => {
 *     await usersRepository.create(tx);
 *     const [first] = await usersRepository.saveAll(newUsers, tx);
 *     const copy = await usersRepository.copyAndSave(first, tx);
 * });
 * ```
 */
export function createEntityRepository<
	TTable extends EntityTable,
	TId extends RowId,
	TFields extends Record<string, unknown>,
>(
	entity: EntityDefinition<TTable, TId, TFields>,
	defaultDb: AnyPgDatabase,
	options: EntityRepositoryOptions = {},
): EntityRepository<TTable, TId, TFields> {
	const table: EntityTable = entity.table;
	const logger = createChildLogger(options.logger ?? getLogger(), {
		component: 'entity-repository',
		table: entity.name,
	});
	const db = (tx?: TransactionContext): AnyPgDatabase => resolveDb(defaultDb, tx);

	const toRow = (record: Record<string, unknown>): PersistedRow<TId, TFields> => ({
		...entity.fields.parse(record),
		id: entity.id.parse(record['id']),
	});

	const toValues = (fields: TFields): Record<string, unknown> => entity.fields.parse(fields);

	async function insert(fields: TFields, tx?: TransactionContext): Promise<TId> {
		const [inserted] = await db(tx).insert(table).values(toValues(fields)).returning({ id: table.id });
		if (!inserted) {
			throw new Error(`Insert into '${entity.name}' returned no identifier`);
		}

		const id = entity.id.parse(inserted.id);
		logger.debug({ id }, 'Row inserted');
		return id;
	}

	async function update(id: TId, fields: TFields, tx?: TransactionContext): Promise<TId> {
		const values = toValues(fields);

		// Nothing to set on an identifier-only entity
		if (Object.keys(values).length === 0) {
			if (!(await exists(id, tx))) {
				throw new EntityNotFoundError(entity.name, id);
			}
			return id;
		}

		const updated = await db(tx)
			.update(table)
			.set(values)
			.where(eq(table.id, id))
			.returning({ id: table.id });

		if (updated.length === 0) {
			throw new EntityNotFoundError(entity.name, id);
		}

		logger.debug({ id }, 'Row updated');
		return id;
	}

	async function save(row: Row<TId, TFields>, tx?: TransactionContext): Promise<TId> {
		return row.id === undefined ? insert(row, tx) : update(row.id, row, tx);
	}

	async function findById(id: TId, tx?: TransactionContext): Promise<PersistedRow<TId, TFields> | undefined> {
		const [record] = await db(tx).select().from(table).where(eq(table.id, id)).limit(1);

		if (!record) return undefined;
		return toRow(record);
	}

	async function findExistingById(id: TId, tx?: TransactionContext): Promise<PersistedRow<TId, TFields>> {
		const row = await findById(id, tx);
		if (!row) {
			throw new EntityNotFoundError(entity.name, id);
		}
		return row;
	}

	async function exists(id: TId, tx?: TransactionContext): Promise<boolean> {
		const [found] = await db(tx).select({ id: table.id }).from(table).where(eq(table.id, id)).limit(1);
		return found !== undefined;
	}

	async function count(tx?: TransactionContext): Promise<number> {
		const [result] = await db(tx)
			.select({ count: sql<number>`count(*)` })
			.from(table);
		return Number(result?.count ?? 0);
	}

	return {
		entity,

		async create(tx?: TransactionContext): Promise<void> {
			await db(tx).execute(createTableStatement(table));
			logger.debug('Table created');
		},

		async drop(tx?: TransactionContext): Promise<void> {
			await db(tx).execute(dropTableStatement(table));
			logger.debug('Table dropped');
		},

		save,

		async saveAll(rows: readonly Row<TId, TFields>[], tx?: TransactionContext): Promise<TId[]> {
			if (rows.length === 0) return [];

			return db(tx).transaction(async (batch) => {
				const ids: TId[] = [];
				for (const row of rows) {
					ids.push(await save(row, { db: batch }));
				}
				return ids;
			});
		},

		findById,

		findExistingById,

		async findAll(tx?: TransactionContext): Promise<PersistedRow<TId, TFields>[]> {
			const records = await db(tx).select().from(table).orderBy(asc(table.id));
			return records.map(toRow);
		},

		async findByIds(ids: readonly TId[], tx?: TransactionContext): Promise<PersistedRow<TId, TFields>[]> {
			if (ids.length === 0) return [];

			const records = await db(tx)
				.select()
				.from(table)
				.where(inArray(table.id, [...ids]));

			const rowsById = new Map<TId, PersistedRow<TId, TFields>>();
			for (const record of records) {
				const row = toRow(record);
				rowsById.set(row.id, row);
			}

			return ids.flatMap((id) => {
				const row = rowsById.get(id);
				return row ? [row] : [];
			});
		},

		async copyAndSave(id: TId, tx?: TransactionContext): Promise<TId> {
			const source = await findExistingById(id, tx);
			return insert(source, tx);
		},

		async deleteById(id: TId, tx?: TransactionContext): Promise<boolean> {
			const deleted = await db(tx).delete(table).where(eq(table.id, id)).returning({ id: table.id });
			logger.debug({ id, deleted: deleted.length }, 'Delete by id');
			return deleted.length > 0;
		},

		async deleteAll(tx?: TransactionContext): Promise<number> {
			const deleted = await db(tx).delete(table).returning({ id: table.id });
			logger.debug({ deleted: deleted.length }, 'Deleted all rows');
			return deleted.length;
		},

		count,

		exists,

		async findPaged(
			page: number,
			pageSize: number,
			tx?: TransactionContext,
		): Promise<PagedResult<PersistedRow<TId, TFields>>> {
			if (!Number.isInteger(page) || page < 0) {
				throw new RangeError(`Page must be a non-negative integer, got ${page}`);
			}
			if (!Number.isInteger(pageSize) || pageSize < 1) {
				throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
			}

			const records = await db(tx)
				.select()
				.from(table)
				.orderBy(asc(table.id))
				.limit(pageSize)
				.offset(page * pageSize);
			const totalItems = await count(tx);

			return createPagedResult(records.map(toRow), page, pageSize, totalItems);
		},
	};
}
