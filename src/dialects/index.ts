import type { Dialect } from "../dialect";
import { StructuralMappingError } from "../errors";
import { mysql } from "./mysql";
import { postgresql } from "./postgresql";

const dialects = new Map<string, Dialect>([
	[postgresql.name, postgresql],
	[mysql.name, mysql],
]);

export function listDialects(): readonly Dialect[] {
	return [...dialects.values()];
}

export function getDialect(name: string): Dialect {
	const dialect = dialects.get(name.toLowerCase());
	if (!dialect) {
		throw new StructuralMappingError(
			`Unsupported dialect '${name}'. Supported: ${[...dialects.keys()].join(", ")}`
		);
	}
	return dialect;
}

export { postgresql, escapeIdentifier } from "./postgresql";
export { mysql, escapeMysqlIdentifier } from "./mysql";
