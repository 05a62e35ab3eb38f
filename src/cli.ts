#!/usr/bin/env node
import { createProgram } from "./program";
import { GeneratorError } from "./errors";

try {
	createProgram().parse();
} catch (error) {
	if (!(error instanceof GeneratorError)) {
		throw error;
	}
	console.error(`error: ${error.message}`);
	process.exitCode = 1;
}
