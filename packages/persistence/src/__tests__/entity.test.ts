import { pgSchema, text } from 'drizzle-orm/pg-core';
import { describe, it, expect } from 'vitest';
import { z } from 'zod/v4';
import { defineEntity, Identifier } from '../entity.js';
import { serialIdColumns } from '../schema/common.js';
import { User, users } from './support/users.js';

describe('defineEntity', () => {
	it('should take its name from the table', () => {
		expect(User.name).toBe('users');
		expect(User.table).toBe(users);
	});

	it('should use the bare table name for tables in a schema', () => {
		const notes = pgSchema('crm').table('notes', { ...serialIdColumns, body: text('body').notNull() });
		const Note = defineEntity(notes, { id: Identifier.number, fields: z.object({ body: z.string() }) });

		expect(Note.name).toBe('notes');
	});

	it('should drop the identifier and unknown keys when mapping fields', () => {
		const fields = User.fields.parse({
			id: 3,
			email: 'test@email.com',
			firstName: 'Krzysztof',
			lastName: 'Nowak',
			createdBy: 'import',
		});

		expect(fields).toEqual({ email: 'test@email.com', firstName: 'Krzysztof', lastName: 'Nowak' });
	});

	it('should reject records missing a field', () => {
		expect(() => User.fields.parse({ email: 'test@email.com', firstName: 'Krzysztof' })).toThrow();
	});
});

describe('Identifier', () => {
	it('should accept database-assigned identifiers', () => {
		expect(Identifier.number.parse(1)).toBe(1);
		expect(Identifier.bigint.parse(9007199254740993n)).toBe(9007199254740993n);
		expect(Identifier.string.parse('usr_1')).toBe('usr_1');
	});

	it('should reject values a sequence never produces', () => {
		expect(Identifier.number.safeParse(0).success).toBe(false);
		expect(Identifier.number.safeParse(1.5).success).toBe(false);
		expect(Identifier.bigint.safeParse(0n).success).toBe(false);
		expect(Identifier.string.safeParse('').success).toBe(false);
	});
});
