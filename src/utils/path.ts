import { existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

/**
 * Returns the directory that runtime data (`data/`, `logs/`) is resolved from.
 * Prefers the `BLUEPRINT_ATLAS_HOME` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const home = process.env.BLUEPRINT_ATLAS_HOME;
	if (home) {
		return home;
	}
	return process.cwd();
}

/**
 * Resolve a path under the runtime `data/` directory.
 */
export function getDataPath(...segments: string[]): string {
	return join(getSafeRootDirectory(), "data", ...segments);
}

let packageRoot: string | undefined;

/**
 * The installed package's own directory: the nearest ancestor of this module
 * holding a `package.json`. Same answer from `src/` and from `dist/src/`.
 */
export function getPackageRoot(): string {
	if (packageRoot) return packageRoot;
	let directory = dirname(fileURLToPath(import.meta.url));
	while (!existsSync(join(directory, "package.json"))) {
		const parent = dirname(directory);
		if (parent === directory) {
			throw new Error(`No package.json above ${fileURLToPath(import.meta.url)}`);
		}
		directory = parent;
	}
	packageRoot = directory;
	return directory;
}

/**
 * Resolve a file shipped with the package, independent of the working directory.
 */
export function getBundledPath(...segments: string[]): string {
	return join(getPackageRoot(), ...segments);
}
