import { pgTable, varchar } from 'drizzle-orm/pg-core';
import { z } from 'zod/v4';
import { defineEntity, Identifier, type FieldsOf, type NewRow, type RowOf } from '../../entity.js';
import { serialIdColumns } from '../../schema/common.js';

export const users = pgTable('users', {
	...serialIdColumns,
	email: varchar('email', { length: 255 }).notNull(),
	firstName: varchar('first_name', { length: 100 }).notNull(),
	lastName: varchar('last_name', { length: 100 }).notNull(),
});

export const User = defineEntity(users, {
	id: Identifier.number,
	fields: z.object({
		email: z.string(),
		firstName: z.string(),
		lastName: z.string(),
	}),
});

export type UserFields = FieldsOf<typeof User>;
export type UserRow = RowOf<typeof User>;

export function newUser(email: string, firstName: string, lastName = 'Nowak'): NewRow<UserFields> {
	return { email, firstName, lastName };
}

export const threeUsers: NewRow<UserFields>[] = [
	newUser('test1@email.com', 'Krzysztof'),
	newUser('test2@email.com', 'Janek'),
	newUser('test3@email.com', 'Marcin'),
];

/**
 * Attach the identifiers returned by saveAll to the rows that were saved.
 */
export function withIds<T extends object, TId>(rows: readonly T[], ids: readonly TId[]): (T & { id: TId | undefined })[] {
	return rows.map((row, index) => ({ ...row, id: ids[index] }));
}
