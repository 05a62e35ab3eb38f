import type { Dialect } from "./dialect";
import type { MappingDocument } from "./model";
import type { RenderContext, Schema, Table } from "./schemaObjects";
import {
	GROUP_BY_DDL_TYPE,
	GROUP_BY_TABLE,
	defaultConfiguration,
	resolveConfiguration,
	type GeneratorConfiguration,
	type PartialConfiguration,
} from "./configuration";
import { DdlWriter } from "./ddlWriter";
import { KeyGeneratorRegistry } from "./keyGenerators";
import { SchemaBuilder } from "./schemaBuilder";
import { StructuralMappingError } from "./errors";
import { getDialect } from "./dialects";

type GroupBy = typeof GROUP_BY_TABLE | typeof GROUP_BY_DDL_TYPE;

/**
 * Builds the schema of a mapping document for one dialect and writes it as DDL.
 *
 * Statements are grouped either per table (drop, create, primary key, foreign
 * keys, indexes, key generator for one table before the next) or per statement
 * kind (all drops, then all creates, and so on).
 */
export class DdlGenerator {
	private readonly _context: RenderContext;

	constructor(
		private readonly _dialect: Dialect,
		private readonly _configuration: GeneratorConfiguration = defaultConfiguration
	) {
		this._context = {
			configuration: _configuration,
			quoteIdentifier: name => _dialect.quoteIdentifier(name),
		};
	}

	get dialect(): Dialect {
		return this._dialect;
	}

	get configuration(): GeneratorConfiguration {
		return this._configuration;
	}

	createSchema(document: MappingDocument): Schema {
		const builder = new SchemaBuilder(
			this._dialect.createSchemaObjectFactory(this._context),
			this._dialect.createTypeMapper(this._configuration),
			new KeyGeneratorRegistry(this._dialect.createKeyGeneratorFactories(this._context))
		);
		return builder.build(document);
	}

	/**
	 * Generate the complete script. The grouping mode is checked before any
	 * work is done.
	 */
	generate(document: MappingDocument): string {
		this.resolveGroupBy();
		const schema = this.createSchema(document);
		const writer = new DdlWriter(this._configuration);
		this.write(schema, writer);
		return writer.toString();
	}

	write(schema: Schema, writer: DdlWriter): void {
		const groupBy = this.resolveGroupBy();

		this.writeHeader(writer);
		if (this._configuration.generate.schema) {
			schema.toCreateDDL(writer);
		}

		if (groupBy === GROUP_BY_TABLE) {
			for (const table of schema.tables) {
				this.writeTable(table, writer);
			}
		} else {
			this.writeByStatementKind(schema, writer);
		}
	}

	private resolveGroupBy(): GroupBy {
		const groupBy = this._configuration.groupBy.toLowerCase();
		if (groupBy === GROUP_BY_TABLE || groupBy === GROUP_BY_DDL_TYPE) {
			return groupBy;
		}
		throw new StructuralMappingError(
			`Unsupported grouping '${this._configuration.groupBy}', expected '${GROUP_BY_TABLE}' or '${GROUP_BY_DDL_TYPE}'`
		);
	}

	private writeHeader(writer: DdlWriter): void {
		writer.println("-- {0} schema", [this._dialect.displayName]);
		writer.println("-- Generated by ddl-synth");
	}

	private writeTable(table: Table, writer: DdlWriter): void {
		const generate = this._configuration.generate;
		if (generate.drop) {
			table.toDropDDL(writer);
		}
		if (generate.create) {
			table.toCreateDDL(writer);
		}
		if (generate.primaryKey) {
			table.primaryKey.toCreateDDL(writer);
		}
		if (generate.foreignKey) {
			table.foreignKeys.forEach(fk => fk.toCreateDDL(writer));
		}
		if (generate.index) {
			table.indexes.forEach(index => index.toCreateDDL(writer));
		}
		if (generate.keyGenerator) {
			writeKeyGenerator(table, writer);
		}
	}

	private writeByStatementKind(schema: Schema, writer: DdlWriter): void {
		const generate = this._configuration.generate;
		const tables = schema.tables;
		if (generate.drop) {
			tables.forEach(table => table.toDropDDL(writer));
		}
		if (generate.create) {
			tables.forEach(table => table.toCreateDDL(writer));
		}
		if (generate.primaryKey) {
			tables.forEach(table => table.primaryKey.toCreateDDL(writer));
		}
		if (generate.foreignKey) {
			tables.forEach(table => table.foreignKeys.forEach(fk => fk.toCreateDDL(writer)));
		}
		if (generate.index) {
			tables.forEach(table => table.indexes.forEach(index => index.toCreateDDL(writer)));
		}
		if (generate.keyGenerator) {
			tables.forEach(table => writeKeyGenerator(table, writer));
		}
	}
}

function writeKeyGenerator(table: Table, writer: DdlWriter): void {
	const keyGenerator = table.keyGenerator;
	if (keyGenerator) {
		keyGenerator.setTable(table);
		keyGenerator.toCreateDDL(writer);
	}
}

export interface GenerateDdlOptions {
	/** Dialect name, `postgresql` when omitted */
	readonly dialect?: string;
	readonly configuration?: PartialConfiguration;
}

/**
 * Convenience function to generate a script in one call.
 */
export function generateDdl(document: MappingDocument, options: GenerateDdlOptions = {}): string {
	const generator = new DdlGenerator(
		getDialect(options.dialect ?? "postgresql"),
		resolveConfiguration(options.configuration)
	);
	return generator.generate(document);
}
