/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml`, creating it with {@link CONFIG_DEFAULT} when it
 * does not exist yet.
 *
 * Behavior
 * - Only known keys are read; unknown keys are ignored
 * - A value of the wrong type (or a non-positive size) is ignored with a
 *   warning and the default kept
 * - A missing file is written atomically (temporary file, then rename)
 * - Logs details at `info`/`debug` levels, including default vs overridden
 *
 * @example
 * import { loadConfig } from './package/config.js';
 * const config = await loadConfig();
 * console.log(config.render.tileWidth);
 *
 * @module package/config
 */
import { relative } from "path";
import { readFile, writeFile, rename, unlink } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { getDataPath, getSafeRootDirectory } from "../utils/path.js";
import type { DeepReadonly } from "../utils/types.js";

export interface MarkupConfig {
	/** Element that declares a blueprint. */
	objectElement: string;
	idAttribute: string;
	parentAttribute: string;
}

export interface EngineConfig {
	/** Gender assumed for blueprints without a Gender tag. */
	defaultGender: string;
}

export interface RenderConfig {
	tileWidth: number;
	tileHeight: number;
	/** Color code used in place of unknown codes. */
	fallbackColor: string;
	/** Enlargement factor for exported tiles. */
	scale: number;
	/** Base image directory, relative to the root directory. */
	texturesDirectory: string;
}

export interface DataConfig {
	/** Palette table, relative to `data/`. */
	palette: string;
	/** Gender table, relative to `data/`. */
	genders: string;
}

export interface Config {
	markup: MarkupConfig;
	engine: EngineConfig;
	render: RenderConfig;
	data: DataConfig;
}

export const CONFIG_DEFAULT: DeepReadonly<Config> = Object.freeze({
	markup: Object.freeze({
		objectElement: "object",
		idAttribute: "Name",
		parentAttribute: "Inherits",
	}),
	engine: Object.freeze({
		defaultGender: "neuter",
	}),
	render: Object.freeze({
		tileWidth: 16,
		tileHeight: 24,
		fallbackColor: "y",
		scale: 10,
		texturesDirectory: "Textures",
	}),
	data: Object.freeze({
		palette: "palette.yaml",
		genders: "genders.yaml",
	}),
});

type Section = Readonly<Record<string, unknown>>;

function isSection(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(document: unknown, name: keyof Config): Section {
	if (!isSection(document)) return {};
	const value = document[name];
	if (value === undefined) return {};
	if (!isSection(value)) {
		logger.warn(`Ignoring config section ${name}: expected a mapping`);
		return {};
	}
	return value;
}

function pickString(source: Section, path: string, key: string, fallback: string): string {
	const value = source[key];
	if (value === undefined) return fallback;
	if (typeof value !== "string" || value.length === 0) {
		logger.warn(`Ignoring config ${path}.${key}: expected a non-empty string`);
		return fallback;
	}
	if (value === fallback) {
		logger.debug(`DEFAULT ${path}.${key} = ${value}`);
	} else {
		logger.debug(`Set ${path}.${key} = ${value}`);
	}
	return value;
}

function pickPositiveInteger(
	source: Section,
	path: string,
	key: string,
	fallback: number
): number {
	const value = source[key];
	if (value === undefined) return fallback;
	if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
		logger.warn(`Ignoring config ${path}.${key}: expected a positive integer`);
		return fallback;
	}
	if (value === fallback) {
		logger.debug(`DEFAULT ${path}.${key} = ${value}`);
	} else {
		logger.debug(`Set ${path}.${key} = ${value}`);
	}
	return value;
}

/**
 * Build a config from a parsed YAML document, keeping defaults for anything
 * missing or invalid.
 */
export function mergeConfig(document: unknown): Config {
	const markup = section(document, "markup");
	const engine = section(document, "engine");
	const render = section(document, "render");
	const data = section(document, "data");
	const defaults = CONFIG_DEFAULT;
	return {
		markup: {
			objectElement: pickString(markup, "markup", "objectElement", defaults.markup.objectElement),
			idAttribute: pickString(markup, "markup", "idAttribute", defaults.markup.idAttribute),
			parentAttribute: pickString(
				markup,
				"markup",
				"parentAttribute",
				defaults.markup.parentAttribute
			),
		},
		engine: {
			defaultGender: pickString(engine, "engine", "defaultGender", defaults.engine.defaultGender),
		},
		render: {
			tileWidth: pickPositiveInteger(render, "render", "tileWidth", defaults.render.tileWidth),
			tileHeight: pickPositiveInteger(render, "render", "tileHeight", defaults.render.tileHeight),
			fallbackColor: pickString(render, "render", "fallbackColor", defaults.render.fallbackColor),
			scale: pickPositiveInteger(render, "render", "scale", defaults.render.scale),
			texturesDirectory: pickString(
				render,
				"render",
				"texturesDirectory",
				defaults.render.texturesDirectory
			),
		},
		data: {
			palette: pickString(data, "data", "palette", defaults.data.palette),
			genders: pickString(data, "data", "genders", defaults.data.genders),
		},
	};
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function writeDefaultConfig(path: string): Promise<void> {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	try {
		// Write to temporary file first
		await writeFile(tempPath, defaultContent, "utf-8");
		// Atomically rename temp file to final location
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) =>
			logger.debug(`Could not remove ${tempPath}`, { error: String(cleanupError) })
		);
		throw writeError;
	}
}

/**
 * Read the configuration file.
 *
 * @param path Defaults to `data/config.yaml` under the root directory
 * @throws YAMLException when the file exists but is not valid YAML
 */
export async function loadConfig(path: string = getDataPath("config.yaml")): Promise<Config> {
	logger.debug(`Loading config from ${relative(getSafeRootDirectory(), path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (!isMissingFile(error)) throw error;
		logger.debug(`Config file not found, creating default at ${path}`);
		await writeDefaultConfig(path);
		return mergeConfig(undefined);
	}
	const config = mergeConfig(YAML.load(content));
	logger.info("Config loaded successfully");
	return config;
}
