#!/usr/bin/env node

/**
 * blueprint-atlas command line.
 *
 * Loads blueprint markup files, prints a summary, and optionally dumps the
 * resolved properties of some blueprints or renders their tiles to PNG.
 *
 * ```
 * blueprint-atlas ObjectBlueprints.xml Creatures.xml --show Snapjaw
 * blueprint-atlas Items.xml --tile Bandage bandage.png --version 2.0.206
 * ```
 */
import { readFile, writeFile } from "fs/promises";
import { isAbsolute, join } from "path";
import YAML from "js-yaml";
import logger from "./src/logger.js";
import { BlueprintError } from "./src/core/errors.js";
import { loadDataset, renderTile, type Dataset } from "./src/core/dataset.js";
import { encodePng } from "./src/core/compositor.js";
import { loadConfig, type Config } from "./src/package/config.js";
import { loadPalette } from "./src/package/palette.js";
import { loadGenders } from "./src/package/genders.js";
import { TextureDirectory } from "./src/package/textures.js";
import { getDataPath, getSafeRootDirectory } from "./src/utils/path.js";

const USAGE =
	"Usage: blueprint-atlas <file.xml...> [--show <id>] [--tile <id> <out.png>] [--version <version>]";

export interface TileRequest {
	id: string;
	output: string;
}

export interface CliArguments {
	files: string[];
	show: string[];
	tiles: TileRequest[];
	version: string;
}

/**
 * @throws Error when an option is missing its value or no file is named
 */
export function parseArguments(argv: ReadonlyArray<string>): CliArguments {
	const result: CliArguments = { files: [], show: [], tiles: [], version: "unknown" };
	const take = (index: number, option: string): string => {
		const value = argv[index];
		if (value === undefined || value.startsWith("--")) {
			throw new Error(`${option} expects a value`);
		}
		return value;
	};
	for (let i = 0; i < argv.length; i++) {
		const argument = argv[i];
		switch (argument) {
			case "--show":
				result.show.push(take(++i, argument));
				break;
			case "--tile": {
				const id = take(++i, argument);
				result.tiles.push({ id, output: take(++i, argument) });
				break;
			}
			case "--version":
				result.version = take(++i, argument);
				break;
			default:
				if (argument.startsWith("--")) throw new Error(`Unknown option ${argument}`);
				result.files.push(argument);
		}
	}
	if (result.files.length === 0) throw new Error("No blueprint files given");
	return result;
}

function fromRoot(path: string): string {
	return isAbsolute(path) ? path : join(getSafeRootDirectory(), path);
}

function showBlueprint(dataset: Dataset, id: string): void {
	const node = dataset.index.get(id);
	if (!node) {
		console.error(`Unknown blueprint: ${id}`);
		process.exitCode = 1;
		return;
	}
	console.log(`\n${node.inheritancePath()}`);
	console.log(
		YAML.dump(dataset.resolver.resolveAll(node), {
			noRefs: true,
			lineWidth: 120,
			skipInvalid: true,
		})
	);
	for (const diagnostic of dataset.diagnostics.forBlueprint(id)) {
		console.log(`  ! ${diagnostic.context}: ${diagnostic.error.message}`);
	}
}

async function writeTiles(
	dataset: Dataset,
	config: Config,
	tiles: ReadonlyArray<TileRequest>
): Promise<void> {
	const palette = await loadPalette(getDataPath(config.data.palette));
	const glyphs = new TextureDirectory(fromRoot(config.render.texturesDirectory));
	for (const tile of tiles) {
		const node = dataset.index.get(tile.id);
		if (!node) {
			console.error(`Unknown blueprint: ${tile.id}`);
			process.exitCode = 1;
			continue;
		}
		const result = renderTile(dataset, node, {
			palette,
			glyphs,
			fallbackColor: config.render.fallbackColor,
			tileWidth: config.render.tileWidth,
			tileHeight: config.render.tileHeight,
			scale: config.render.scale,
		});
		await writeFile(tile.output, encodePng(result.image));
		console.log(
			`Wrote ${tile.output} (${result.image.width}x${result.image.height})${
				result.complete ? "" : " [blank: base image missing]"
			}`
		);
	}
}

async function main(): Promise<void> {
	let args: CliArguments;
	try {
		args = parseArguments(process.argv.slice(2));
	} catch (error) {
		console.error(error instanceof Error ? error.message : String(error));
		console.error(USAGE);
		process.exitCode = 2;
		return;
	}

	const config = await loadConfig();
	const genders = await loadGenders(getDataPath(config.data.genders));
	const files = await Promise.all(
		args.files.map(async (path) => ({ path, content: await readFile(path) }))
	);

	let dataset: Dataset;
	try {
		dataset = loadDataset(
			{ files, version: args.version },
			{
				genders,
				defaultGender: config.engine.defaultGender,
				markup: config.markup,
			}
		);
	} catch (error) {
		if (!(error instanceof BlueprintError)) throw error;
		logger.error(error.message, { kind: error.name });
		console.error(`Load failed: ${error.message}`);
		process.exitCode = 1;
		return;
	}

	console.log(`Version: ${dataset.version}`);
	console.log(`Root: ${dataset.root.id}`);
	console.log(`Blueprints: ${dataset.index.size}`);
	for (const source of dataset.sources) {
		console.log(`  ${source.path}: ${source.blueprints} blueprints, ${source.repairs} repairs`);
	}

	for (const id of args.show) showBlueprint(dataset, id);
	if (args.tiles.length > 0) await writeTiles(dataset, config, args.tiles);

	if (dataset.diagnostics.size > 0) {
		console.log(`\n${dataset.diagnostics.size} diagnostic(s); see logs/ for details`);
	}
}

// Run if executed directly
const scriptPath = new URL(import.meta.url).pathname;
const isMainModule =
	process.argv[1] === scriptPath ||
	process.argv[1]?.endsWith("index.ts") ||
	process.argv[1]?.endsWith("index.js") ||
	process.argv[1]?.endsWith("blueprint-atlas");

if (isMainModule) {
	await main();
}
