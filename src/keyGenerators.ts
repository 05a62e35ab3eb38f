import type { KeyGeneratorDescriptor } from "./model";
import { StructuralMappingError } from "./errors";
import { KeyGenerator, KeyGeneratorStrategy, type RenderContext } from "./schemaObjects";
import { formatTemplate, type DdlWriter } from "./ddlWriter";

/**
 * Creates key generators of one strategy for one dialect.
 */
export interface KeyGeneratorFactory {
	readonly strategy: string;
	create(alias: string, parameters: Readonly<Record<string, string>>): KeyGenerator;
}

export function simpleKeyGeneratorFactory(context: RenderContext, strategy: string): KeyGeneratorFactory {
	return {
		strategy,
		create: (alias, parameters) => new KeyGenerator(context, alias, strategy, parameters),
	};
}

/**
 * Database sequence. The `sequence` parameter is a name pattern where `{0}`
 * stands for the table name; `increment` sets the step.
 */
export class SequenceKeyGenerator extends KeyGenerator {
	get sequenceName(): string {
		const table = this.table;
		if (!table) {
			throw new StructuralMappingError(`Key generator '${this.alias}' is not assigned to a table`);
		}
		return formatTemplate(this.parameters.sequence ?? "{0}_seq", [table.name]);
	}

	toCreateDDL(writer: DdlWriter): void {
		const increment = this.parameters.increment;
		writer.println();
		writer.println("CREATE SEQUENCE IF NOT EXISTS {0}{1}{2}", [
			this.quote(this.sequenceName),
			increment !== undefined ? ` INCREMENT BY ${increment}` : "",
			writer.delimiter,
		]);
	}
}

export function sequenceKeyGeneratorFactory(context: RenderContext): KeyGeneratorFactory {
	return {
		strategy: KeyGeneratorStrategy.Sequence,
		create: (alias, parameters) =>
			new SequenceKeyGenerator(context, alias, KeyGeneratorStrategy.Sequence, parameters),
	};
}

/**
 * Named key generators of one generation run, keyed by upper-cased name.
 *
 * Every supported strategy is available under its own name; definitions from
 * the mapping document are added on top and may shadow them.
 */
export class KeyGeneratorRegistry {
	private readonly _factories = new Map<string, KeyGeneratorFactory>();
	private readonly _generators = new Map<string, KeyGenerator>();

	constructor(factories: readonly KeyGeneratorFactory[]) {
		for (const factory of factories) {
			const strategy = factory.strategy.toUpperCase();
			this._factories.set(strategy, factory);
			this._generators.set(strategy, factory.create(strategy, {}));
		}
	}

	get strategies(): readonly string[] {
		return [...this._factories.keys()];
	}

	/**
	 * Register a definition from the mapping document. A later definition with
	 * the same name replaces the earlier one.
	 */
	register(definition: KeyGeneratorDescriptor): KeyGenerator {
		const factory = this._factories.get(definition.strategy.toUpperCase());
		if (!factory) {
			throw new StructuralMappingError(
				`Key generator '${definition.name}' uses unsupported strategy '${definition.strategy}'`
			);
		}
		const generator = factory.create(definition.name, definition.parameters);
		this._generators.set(definition.name.toUpperCase(), generator);
		return generator;
	}

	/** Same strategies and definitions; registering into the copy leaves this registry untouched */
	copy(): KeyGeneratorRegistry {
		const copy = new KeyGeneratorRegistry([]);
		this._factories.forEach((factory, strategy) => copy._factories.set(strategy, factory));
		this._generators.forEach((generator, name) => copy._generators.set(name, generator));
		return copy;
	}

	get(name: string): KeyGenerator {
		const generator = this._generators.get(name.toUpperCase());
		if (!generator) {
			throw new StructuralMappingError(`No key generator named '${name}'`);
		}
		return generator;
	}
}
