import { Command } from "commander";
import * as fs from "fs";
import { DdlGenerator } from "./generator";
import { defaultConfiguration, loadConfiguration, type GeneratorConfiguration } from "./configuration";
import { getDialect, listDialects } from "./dialects";
import { loadMappingDocument } from "./mappingDocument";

/**
 * Where the CLI writes. Generated scripts go to `out`, status messages to `log`.
 */
export interface CliIO {
	out(text: string): void;
	log(message: string): void;
}

export const consoleIO: CliIO = {
	out: text => process.stdout.write(text),
	log: message => console.log(message),
};

interface GenerateOptions {
	dialect: string;
	config?: string;
	output?: string;
	groupBy?: string;
	schemaName?: string;
	drop: boolean;
	foreignKeys: boolean;
	indexes: boolean;
	keyGenerators: boolean;
}

function toConfiguration(options: GenerateOptions): GeneratorConfiguration {
	const base = options.config ? loadConfiguration(options.config) : defaultConfiguration;
	return {
		...base,
		groupBy: options.groupBy ?? base.groupBy,
		schemaName: options.schemaName ?? base.schemaName,
		generate: {
			...base.generate,
			drop: base.generate.drop && options.drop,
			foreignKey: base.generate.foreignKey && options.foreignKeys,
			index: base.generate.index && options.indexes,
			keyGenerator: base.generate.keyGenerator && options.keyGenerators,
		},
	};
}

export function createProgram(io: CliIO = consoleIO): Command {
	const program = new Command();

	program
		.name("ddl-synth")
		.description("Generate database DDL scripts from object-to-table mapping files")
		.version("1.0.0");

	program
		.command("generate")
		.description("Derive the relational schema of a mapping file and write it as DDL")
		.argument("<mapping>", "Mapping JSON file")
		.option("-d, --dialect <name>", "Target database dialect", "postgresql")
		.option("-c, --config <file>", "Generator configuration JSON file")
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.option("-g, --group-by <mode>", "Statement grouping: table or ddltype")
		.option("--schema-name <name>", "Create the schema and generate into it")
		.option("--no-drop", "Omit DROP TABLE statements")
		.option("--no-foreign-keys", "Omit foreign key constraints")
		.option("--no-indexes", "Omit indexes")
		.option("--no-key-generators", "Omit key generator objects such as sequences")
		.action((mapping: string, options: GenerateOptions) => {
			const generator = new DdlGenerator(getDialect(options.dialect), toConfiguration(options));
			const ddl = generator.generate(loadMappingDocument(mapping));

			if (options.output) {
				fs.writeFileSync(options.output, ddl);
				io.log(`Wrote ${options.output}`);
			} else {
				io.out(ddl);
			}
		});

	program
		.command("dialects")
		.description("List the supported database dialects")
		.action(() => {
			for (const dialect of listDialects()) {
				io.log(`${dialect.name}\t${dialect.displayName}`);
			}
		});

	return program;
}
