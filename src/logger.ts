/**
 * Logger module: structured application logging
 *
 * Provides the preconfigured Winston logger used across the project.
 * Writes plain-text logs with JSON metadata to files and colorized
 * human-readable logs to the console (console output is disabled during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * Usage
 * ```ts
 * import logger from './logger.js';
 *
 * logger.info('Loaded %d blueprints', 4120);
 * logger.warn('Unknown color code', { code: 'Q' });
 * logger.debug('Repair counts', { counts });
 * ```
 *
 * @module logger
 */
import winston from "winston";
import path from "path";
import { getSafeRootDirectory } from "./utils/path.js";

// node:test sets this for every test file it runs
const isTestMode = process.env.NODE_TEST_CONTEXT;

const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";
const LOG_DIRECTORY = path.join(getSafeRootDirectory(), "logs");

const fileFormat = winston.format.combine(
	winston.format.uncolorize(),
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.printf(
		({ timestamp, level, message, ...meta }) =>
			`[${timestamp}] ${level.toUpperCase()}: ${message}${
				Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
			}`
	)
);

const logger = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "blueprint-atlas" },
	transports: [
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: fileFormat,
		}),
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: fileFormat,
		}),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length && meta.service === undefined
											? " " + JSON.stringify(meta)
											: ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

export default logger;
