import type { RowId } from './entity.js';

/**
 * Thrown when an operation requires a row that does not exist:
 * `findExistingById`, `copyAndSave`, and `save` of a row whose id matches nothing.
 *
 * Database errors (constraint violations, lost connections) are never wrapped.
 */
export class EntityNotFoundError extends Error {
	readonly reason = 'not_found';

	constructor(
		public readonly table: string,
		public readonly id: RowId,
	) {
		super(`No row in '${table}' with id ${String(id)}`);
		this.name = 'EntityNotFoundError';
	}
}
