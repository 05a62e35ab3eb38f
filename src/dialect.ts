import type { GeneratorConfiguration } from "./configuration";
import type { KeyGeneratorFactory } from "./keyGenerators";
import type { RenderContext, SchemaObjectFactory } from "./schemaObjects";
import type { TypeMapper } from "./typeInfo";

/**
 * Everything that differs between target databases.
 */
export interface Dialect {
	/** Name used on the command line, e.g. `postgresql` */
	readonly name: string;
	readonly displayName: string;
	quoteIdentifier(name: string): string;
	createTypeMapper(configuration: GeneratorConfiguration): TypeMapper;
	createSchemaObjectFactory(context: RenderContext): SchemaObjectFactory;
	/** One factory per key-generation strategy the database supports */
	createKeyGeneratorFactories(context: RenderContext): readonly KeyGeneratorFactory[];
}
