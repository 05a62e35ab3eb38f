import type { Dialect } from "../dialect";
import type { DdlWriter } from "../ddlWriter";
import type { TypeDefaults } from "../configuration";
import { KeyGeneratorStrategy, PrimaryKey, Schema, SchemaObjectFactory, Table } from "../schemaObjects";
import { DialectTypeMapper, LengthType, NoParamType, PrecisionType, type TypeDefinition } from "../typeInfo";
import { simpleKeyGeneratorFactory } from "../keyGenerators";

export function escapeMysqlIdentifier(name: string): string {
	return `\`${name.replace(/`/g, "``")}\``;
}

export function mysqlTypes(defaults: TypeDefaults): TypeDefinition[] {
	return [
		new LengthType("bit", "BIT"),
		new NoParamType("boolean", "BOOLEAN"),
		new NoParamType("tinyint", "TINYINT"),
		new NoParamType("smallint", "SMALLINT"),
		new NoParamType("integer", "INTEGER"),
		new NoParamType("bigint", "BIGINT"),
		new NoParamType("float", "FLOAT"),
		new NoParamType("real", "REAL"),
		new NoParamType("double", "DOUBLE"),
		new PrecisionType("numeric", "NUMERIC", defaults.numericPrecision, defaults.numericDecimals),
		new PrecisionType("decimal", "DECIMAL", defaults.numericPrecision, defaults.numericDecimals),
		new LengthType("char", "CHAR", defaults.charLength),
		new LengthType("varchar", "VARCHAR", defaults.varcharLength),
		new NoParamType("longvarchar", "LONGTEXT"),
		new NoParamType("date", "DATE"),
		new NoParamType("time", "TIME"),
		new NoParamType("timestamp", "TIMESTAMP"),
		new LengthType("binary", "BINARY", defaults.binaryLength),
		new LengthType("varbinary", "VARBINARY", defaults.binaryLength),
		new NoParamType("longvarbinary", "LONGBLOB"),
		new NoParamType("blob", "BLOB"),
		new NoParamType("clob", "LONGTEXT"),
	];
}

/**
 * MySQL has no schemas inside a database; the schema name selects the database.
 */
class MysqlSchema extends Schema {
	toCreateDDL(writer: DdlWriter): void {
		const name = this.name;
		if (name === undefined) {
			return;
		}
		writer.println();
		writer.println("CREATE DATABASE IF NOT EXISTS {0}{1}", [this.quote(name), writer.delimiter]);
		writer.println("USE {0}{1}", [this.quote(name), writer.delimiter]);
	}
}

/**
 * The primary key is added after CREATE TABLE, so identity columns cannot be
 * AUTO_INCREMENT here; IDENTITY generators render no DDL of their own.
 */
class MysqlTable extends Table {
	protected tableOptions(): string {
		const engine = this.configuration.mysql.storageEngine;
		return engine ? ` ENGINE=${engine}` : "";
	}
}

class MysqlPrimaryKey extends PrimaryKey {
	toCreateDDL(writer: DdlWriter): void {
		if (this.fields.length === 0) {
			return;
		}
		writer.println();
		writer.println("ALTER TABLE {0} ADD PRIMARY KEY ({1}){2}", [
			this.quote(this.table.name),
			this.quoteList(this.fields.map(f => f.name)),
			writer.delimiter,
		]);
	}
}

class MysqlSchemaObjectFactory extends SchemaObjectFactory {
	createSchema(): Schema {
		return new MysqlSchema(this.context);
	}

	createTable(name: string): Table {
		return new MysqlTable(this.context, name, table => this.createPrimaryKey(table));
	}

	createPrimaryKey(table: Table): PrimaryKey {
		return new MysqlPrimaryKey(this.context, table);
	}
}

export const mysql: Dialect = {
	name: "mysql",
	displayName: "MySQL",
	quoteIdentifier: escapeMysqlIdentifier,
	createTypeMapper: configuration => new DialectTypeMapper(mysqlTypes(configuration.typeDefaults)),
	createSchemaObjectFactory: context => new MysqlSchemaObjectFactory(context),
	createKeyGeneratorFactories: context => [
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.Max),
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.HighLow),
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.Uuid),
		simpleKeyGeneratorFactory(context, KeyGeneratorStrategy.Identity),
	],
};
