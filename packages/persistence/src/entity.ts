/**
 * Entity Definition
 *
 * An entity pairs a DrizzleORM table with the mapping between its records
 * and in-memory rows. Rows carry an optional identifier: absent until the
 * row is persisted, assigned by the database on insert.
 *
 * @example
 * ```typescript
 * const users = pgTable('users', {
 *     ...serialIdColumns,
 *     email: varchar('email', { length: 255 }).notNull(),
 *     firstName: varchar('first_name', { length: 100 }).notNull(),
 *     lastName: varchar('last_name', { length: 100 }).notNull(),
 * });
 *
 * export const User = defineEntity(users, {
 *     id: Identifier.number,
 *     fields: z.object({ email: z.string(), firstName: z.string(), lastName: z.string() }),
 * });
 *
 * export type UserRow = RowOf<typeof User>;
 * ```
 */

import { getTableName } from 'drizzle-orm';
import type { AnyPgColumn, PgTable } from 'drizzle-orm/pg-core';
import { z } from 'zod/v4';

/**
 * Identifier value types a database can assign.
 */
export type RowId = number | bigint | string;

/**
 * A table usable as an entity: any PostgreSQL table with an `id` column.
 */
export type EntityTable = PgTable & { readonly id: AnyPgColumn };

/**
 * A row that may or may not have been persisted yet.
 */
export type Row<TId extends RowId, TFields> = TFields & { readonly id?: TId | undefined };

/**
 * A row that has not been persisted.
 */
export type NewRow<TFields> = TFields & { readonly id?: undefined };

/**
 * A row read from (or written to) the database; its identifier is always present.
 */
export type PersistedRow<TId extends RowId, TFields> = TFields & { readonly id: TId };

/**
 * Zod schemas identifier columns are read through.
 */
export const Identifier = {
	/** `bigserial` / `serial` in number mode */
	number: z.number().int().positive(),
	/** `bigserial` in bigint mode */
	bigint: z.bigint().positive(),
	/** Text keys assigned by a database default */
	string: z.string().min(1),
};

/**
 * How records map to rows: `id` parses the identifier column, `fields`
 * parses everything else. Keys `fields` does not know are dropped on both
 * reads and writes.
 */
export interface EntityMapping<TId extends RowId, TFields extends Record<string, unknown>> {
	readonly id: z.ZodType<TId>;
	readonly fields: z.ZodType<TFields>;
}

export interface EntityDefinition<
	TTable extends EntityTable,
	TId extends RowId,
	TFields extends Record<string, unknown>,
> extends EntityMapping<TId, TFields> {
	/** Table name, used in logs and errors */
	readonly name: string;
	readonly table: TTable;
}

/**
 * Declare an entity over a table.
 */
export function defineEntity<TTable extends EntityTable, TId extends RowId, TFields extends Record<string, unknown>>(
	table: TTable,
	mapping: EntityMapping<TId, TFields>,
): EntityDefinition<TTable, TId, TFields> {
	return {
		name: getTableName(table),
		table,
		id: mapping.id,
		fields: mapping.fields,
	};
}

export type IdOf<E> =
	E extends EntityDefinition<EntityTable, infer TId extends RowId, Record<string, unknown>> ? TId : never;

export type FieldsOf<E> =
	E extends EntityDefinition<EntityTable, RowId, infer TFields extends Record<string, unknown>> ? TFields : never;

/** Row type of an entity, identifier optional. */
export type RowOf<E> = Row<IdOf<E>, FieldsOf<E>>;

/** Row type of an entity as read from the database. */
export type PersistedRowOf<E> = PersistedRow<IdOf<E>, FieldsOf<E>>;
