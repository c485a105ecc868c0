/**
 * Schema DDL
 *
 * Builds `create table` / `drop table` statements from a DrizzleORM table
 * definition so repositories can manage their own backing table at runtime.
 * Statements carry no bind parameters: PostgreSQL rejects them in DDL, so
 * values inside defaults, checks and generated expressions are inlined.
 */

import { is, sql, SQL } from 'drizzle-orm';
import {
	getTableConfig,
	type Check,
	type ForeignKey,
	type PgColumn,
	type PgTable,
	type UniqueConstraint,
} from 'drizzle-orm/pg-core';

/**
 * `create table if not exists` for the given table: column types, identity
 * and generated columns, primary keys, `not null`, `unique`, defaults, and
 * the table's unique, check and foreign key constraints.
 *
 * @throws Error when the table declares indexes, which need statements of their own
 */
export function createTableStatement(table: PgTable): SQL {
	const config = getTableConfig(table);

	if (config.indexes.length > 0) {
		throw new Error(`Table '${config.name}' declares indexes; create them with a migration instead`);
	}

	const definitions = config.columns.map(columnDefinition);

	for (const primaryKey of config.primaryKeys) {
		definitions.push(sql`primary key (${identifierList(primaryKey.columns)})`);
	}
	definitions.push(...config.uniqueConstraints.map(uniqueConstraint));
	definitions.push(...config.checks.map(checkConstraint));
	definitions.push(...config.foreignKeys.map(foreignKeyConstraint));

	const name = qualifiedName(config.schema, config.name);
	return sql`create table if not exists ${name} (${sql.join(definitions, sql`, `)})`.inlineParams();
}

/**
 * `drop table if exists` for the given table.
 */
export function dropTableStatement(table: PgTable): SQL {
	const config = getTableConfig(table);
	return sql`drop table if exists ${qualifiedName(config.schema, config.name)}`;
}

function qualifiedName(schema: string | undefined, name: string): SQL {
	return schema ? sql`${sql.identifier(schema)}.${sql.identifier(name)}` : sql`${sql.identifier(name)}`;
}

function identifierList(columns: readonly PgColumn[]): SQL {
	return sql.join(
		columns.map((column) => sql`${sql.identifier(column.name)}`),
		sql`, `,
	);
}

function columnDefinition(column: PgColumn): SQL {
	const parts: SQL[] = [sql`${sql.identifier(column.name)}`, sql.raw(column.getSQLType())];

	if (column.primary) {
		parts.push(sql.raw('primary key'));
	} else if (column.notNull) {
		parts.push(sql.raw('not null'));
	}

	if (column.isUnique) {
		parts.push(sql.raw(column.uniqueType === 'not distinct' ? 'unique nulls not distinct' : 'unique'));
	}

	const identity = column.generatedIdentity;
	if (identity) {
		const kind = identity.type === 'always' ? 'always' : 'by default';
		const options = sequenceOptions(identity.sequenceName, identity.sequenceOptions);
		parts.push(options ? sql`generated ${sql.raw(kind)} as identity (${options})` : sql`generated ${sql.raw(kind)} as identity`);
	}

	if (column.generated) {
		parts.push(sql`generated always as (${generatedExpression(column.generated.as)}) stored`);
	} else {
		const defaultValue = defaultExpression(column.default);
		if (defaultValue) {
			parts.push(sql`default ${defaultValue}`);
		}
	}

	return sql.join(parts, sql.raw(' '));
}

interface SequenceOptions {
	readonly increment?: number | string;
	readonly minValue?: number | string;
	readonly maxValue?: number | string;
	readonly startWith?: number | string;
	readonly cache?: number | string;
	readonly cycle?: boolean;
}

function sequenceOptions(name: string | undefined, options: SequenceOptions | undefined): SQL | undefined {
	const clauses: SQL[] = [];

	if (name) clauses.push(sql`sequence name ${sql.identifier(name)}`);
	if (options?.increment !== undefined) clauses.push(sql.raw(`increment by ${options.increment}`));
	if (options?.minValue !== undefined) clauses.push(sql.raw(`minvalue ${options.minValue}`));
	if (options?.maxValue !== undefined) clauses.push(sql.raw(`maxvalue ${options.maxValue}`));
	if (options?.startWith !== undefined) clauses.push(sql.raw(`start with ${options.startWith}`));
	if (options?.cache !== undefined) clauses.push(sql.raw(`cache ${options.cache}`));
	if (options?.cycle) clauses.push(sql.raw('cycle'));

	return clauses.length > 0 ? sql.join(clauses, sql.raw(' ')) : undefined;
}

function isSqlFactory(value: unknown): value is () => SQL {
	return typeof value === 'function';
}

function generatedExpression(value: unknown): SQL {
	return isSqlFactory(value) ? value() : literal(value);
}

function uniqueConstraint(constraint: UniqueConstraint): SQL {
	const name = constraint.getName();
	const prefix = name ? sql`constraint ${sql.identifier(name)} ` : sql.empty();
	const nulls = constraint.nullsNotDistinct ? sql.raw(' nulls not distinct') : sql.empty();
	return sql`${prefix}unique${nulls} (${identifierList(constraint.columns)})`;
}

function checkConstraint(check: Check): SQL {
	return sql`constraint ${sql.identifier(check.name)} check (${check.value})`;
}

function foreignKeyConstraint(foreignKey: ForeignKey): SQL {
	const { columns, foreignColumns, foreignTable } = foreignKey.reference();
	const target = getTableConfig(foreignTable);
	const parts: SQL[] = [
		sql`constraint ${sql.identifier(foreignKey.getName())} foreign key (${identifierList(columns)})`,
		sql`references ${qualifiedName(target.schema, target.name)} (${identifierList(foreignColumns)})`,
	];

	if (foreignKey.onDelete) parts.push(sql.raw(`on delete ${foreignKey.onDelete}`));
	if (foreignKey.onUpdate) parts.push(sql.raw(`on update ${foreignKey.onUpdate}`));

	return sql.join(parts, sql.raw(' '));
}

/**
 * Render a column default as an inline SQL expression.
 * Defaults produced on the JS side ($defaultFn) have no DDL counterpart.
 */
function defaultExpression(value: unknown): SQL | undefined {
	return value === undefined ? undefined : literal(value);
}

function literal(value: unknown): SQL {
	if (is(value, SQL)) return value;
	if (value === null) return sql.raw('null');

	switch (typeof value) {
		case 'number':
		case 'bigint':
		case 'boolean':
			return sql.raw(String(value));
		case 'string':
			return sql.raw(quoteLiteral(value));
	}

	if (value instanceof Date) {
		return sql.raw(quoteLiteral(value.toISOString()));
	}

	return sql.raw(quoteLiteral(JSON.stringify(value)));
}

function quoteLiteral(value: string): string {
	return `'${value.replaceAll("'", "''")}'`;
}
