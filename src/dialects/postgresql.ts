import type { Dialect } from "../dialect";
import type { DdlWriter } from "../ddlWriter";
import type { TypeDefaults } from "../configuration";
import {
	Field,
	KeyGeneratorStrategy,
	Schema,
	SchemaObjectFactory,
	Table,
	type FieldOptions,
} from "../schemaObjects";
import { DialectTypeMapper, LengthType, NoParamType, PrecisionType, type TypeDefinition } from "../typeInfo";
import { sequenceKeyGeneratorFactory, simpleKeyGeneratorFactory } from "../keyGenerators";

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes.
 */
export function escapeIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

export function postgresTypes(defaults: TypeDefaults): TypeDefinition[] {
	return [
		new NoParamType("bit", "BOOLEAN"),
		new NoParamType("boolean", "BOOLEAN"),
		new NoParamType("tinyint", "SMALLINT"),
		new NoParamType("smallint", "SMALLINT"),
		new NoParamType("integer", "INTEGER"),
		new NoParamType("bigint", "BIGINT"),
		new NoParamType("float", "DOUBLE PRECISION"),
		new NoParamType("real", "REAL"),
		new NoParamType("double", "DOUBLE PRECISION"),
		new PrecisionType("numeric", "NUMERIC", defaults.numericPrecision, defaults.numericDecimals),
		new PrecisionType("decimal", "DECIMAL", defaults.numericPrecision, defaults.numericDecimals),
		new LengthType("char", "CHAR", defaults.charLength),
		new LengthType("varchar", "VARCHAR", defaults.varcharLength),
		new NoParamType("longvarchar", "TEXT"),
		new NoParamType("date", "DATE"),
		new NoParamType("time", "TIME"),
		new NoParamType("timestamp", "TIMESTAMP"),
		new NoParamType("binary", "BYTEA"),
		new NoParamType("varbinary", "BYTEA"),
		new NoParamType("longvarbinary", "BYTEA"),
		new NoParamType("blob", "BYTEA"),
		new NoParamType("clob", "TEXT"),
	];
}

class PostgresSchema extends Schema {
	toCreateDDL(writer: DdlWriter): void {
		const name = this.name;
		if (name === undefined) {
			return;
		}
		writer.println();
		writer.println("CREATE SCHEMA IF NOT EXISTS {0}{1}", [this.quote(name), writer.delimiter]);
		writer.println("SET search_path TO {0}{1}", [this.quote(name), writer.delimiter]);
	}
}

class PostgresTable extends Table {
	toDropDDL(writer: DdlWriter): void {
		writer.println();
		writer.println("DROP TABLE IF EXISTS {0} CASCADE{1}", [this.quote(this.name), writer.delimiter]);
	}
}

class PostgresField extends Field {
	protected generatedClause(): string | undefined {
		return this.usesIdentityGenerator() ? "GENERATED BY DEFAULT AS IDENTITY" : undefined;
	}
}

class PostgresSchemaObjectFactory extends SchemaObjectFactory {
	createSchema(): Schema {
		return new PostgresSchema(this.context);
	}

	createTable(name: string): Table {
		return new PostgresTable(this.context, name, table => this.createPrimaryKey(table));
	}

	createField(options: FieldOptions): Field {
		return new PostgresField(this.context, options);
	}
}

export const postgresql: Dialect = {
	name: "postgresql",
	displayName: "PostgreSQL",
	quoteIdentifier: escapeIdentifier,
	createTypeMapper: configuration => new DialectTypeMapper(postgresTypes(configuration.typeDefaults)),
	createSchemaObjectFactory: context => new PostgresSchemaObjectFactory(context),
	createKeyGeneratorFactories: context => [
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.Max),
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.HighLow),
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.Uuid),
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.Identity),
		sequenceKeyGeneratorFactory(context),
	],
};
