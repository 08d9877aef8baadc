import * as fs from "fs";
import * as path from "path";
import Ajv from "ajv";
import { ConfigError } from "./errors";

export const CONFIG_FILE_NAME = "ddl-translate.config.json";

export interface TranslateConfig {
	/** Input file or directory */
	readonly input?: string;
	/** Root of the output tree */
	readonly output?: string;
	/** Root of the input tree, for sequence definitions */
	readonly inputRoot?: string;
	/** Schema for unqualified names */
	readonly defaultSchema?: string;
}

export const configJsonSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	properties: {
		$schema: { type: "string" },
		input: { type: "string", minLength: 1 },
		output: { type: "string", minLength: 1 },
		inputRoot: { type: "string", minLength: 1 },
		defaultSchema: { type: "string", pattern: "^[^.\\s]+$" },
	},
	additionalProperties: false,
};

const validateConfig = new Ajv({ strict: false, allErrors: true }).compile<TranslateConfig>(configJsonSchema);

/**
 * Load a config file. Relative paths in it resolve against the file's
 * directory. Without an explicit file, `ddl-translate.config.json` in `cwd`
 * is used when present.
 */
export function loadConfig(file: string | undefined, cwd: string = process.cwd()): TranslateConfig {
	const configPath = file === undefined ? path.join(cwd, CONFIG_FILE_NAME) : path.resolve(cwd, file);
	if (file === undefined && !fs.existsSync(configPath)) return {};

	let data: unknown;
	try {
		data = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (error) {
		throw new ConfigError(configPath, [error instanceof Error ? error.message : String(error)]);
	}
	if (!validateConfig(data)) {
		const details = (validateConfig.errors ?? []).map(e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
		throw new ConfigError(configPath, details);
	}

	const base = path.dirname(configPath);
	const resolve = (value: string | undefined) => (value === undefined ? undefined : path.resolve(base, value));
	return {
		input: resolve(data.input),
		output: resolve(data.output),
		inputRoot: resolve(data.inputRoot),
		defaultSchema: data.defaultSchema,
	};
}
