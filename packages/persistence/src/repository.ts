/**
 * Repository Interface
 *
 * Generic repository contract for identifier-addressed CRUD over a single table.
 * Every operation accepts an optional transaction context as its last argument.
 */

import type { PersistedRow, Row, RowId } from './entity.js';
import type { TransactionContext } from './transaction.js';

/**
 * Base repository interface for row persistence.
 *
 * @typeParam TId - Identifier type assigned by the database
 * @typeParam TFields - Non-identifier attributes of a row
 */
export interface Repository<TId extends RowId, TFields extends Record<string, unknown>> {
	/**
	 * Create the backing table if it does not exist yet.
	 */
	create(tx?: TransactionContext): Promise<void>;

	/**
	 * Drop the backing table.
	 */
	drop(tx?: TransactionContext): Promise<void>;

	/**
	 * Insert a row without an id, or update the row with the same id.
	 *
	 * @returns The new identifier (insert) or the row's own identifier (update)
	 * @throws EntityNotFoundError when updating an id with no row
	 */
	save(row: Row<TId, TFields>, tx?: TransactionContext): Promise<TId>;

	/**
	 * Save every row in order, atomically.
	 *
	 * @returns Identifiers in the same order as the rows
	 */
	saveAll(rows: readonly Row<TId, TFields>[], tx?: TransactionContext): Promise<TId[]>;

	/**
	 * Find a row by its identifier.
	 *
	 * @returns The row if found, undefined otherwise
	 */
	findById(id: TId, tx?: TransactionContext): Promise<PersistedRow<TId, TFields> | undefined>;

	/**
	 * Find a row that must exist.
	 *
	 * @throws EntityNotFoundError if there is no row with this identifier
	 */
	findExistingById(id: TId, tx?: TransactionContext): Promise<PersistedRow<TId, TFields>>;

	/**
	 * Find all rows, ascending by identifier.
	 */
	findAll(tx?: TransactionContext): Promise<PersistedRow<TId, TFields>[]>;

	/**
	 * Find the rows with the given identifiers, in the order the identifiers
	 * were given. Identifiers without a row are skipped.
	 */
	findByIds(ids: readonly TId[], tx?: TransactionContext): Promise<PersistedRow<TId, TFields>[]>;

	/**
	 * Insert a copy of an existing row under a new identifier.
	 *
	 * @returns The identifier of the copy
	 * @throws EntityNotFoundError if the source row does not exist
	 */
	copyAndSave(id: TId, tx?: TransactionContext): Promise<TId>;

	/**
	 * Delete a row by identifier.
	 *
	 * @returns True if a row was deleted, false if there was none
	 */
	deleteById(id: TId, tx?: TransactionContext): Promise<boolean>;

	/**
	 * Delete every row.
	 *
	 * @returns Number of rows deleted
	 */
	deleteAll(tx?: TransactionContext): Promise<number>;

	/**
	 * Count all rows.
	 */
	count(tx?: TransactionContext): Promise<number>;

	/**
	 * Check if a row exists by identifier.
	 */
	exists(id: TId, tx?: TransactionContext): Promise<boolean>;

	/**
	 * Find rows with pagination, ascending by identifier.
	 *
	 * @param page - Page number (0-indexed)
	 * @param pageSize - Number of items per page
	 */
	findPaged(page: number, pageSize: number, tx?: TransactionContext): Promise<PagedResult<PersistedRow<TId, TFields>>>;
}

/**
 * Paginated result with metadata.
 */
export interface PagedResult<T> {
	readonly items: T[];
	readonly page: number;
	readonly pageSize: number;
	readonly totalItems: number;
	readonly totalPages: number;
	readonly hasNext: boolean;
	readonly hasPrevious: boolean;
}

/**
 * Create a paginated result from items and counts.
 */
export function createPagedResult<T>(items: T[], page: number, pageSize: number, totalItems: number): PagedResult<T> {
	const totalPages = Math.ceil(totalItems / pageSize);
	return {
		items,
		page,
		pageSize,
		totalItems,
		totalPages,
		hasNext: page < totalPages - 1,
		hasPrevious: page > 0,
	};
}
