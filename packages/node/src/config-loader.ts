import { promises as fs } from "node:fs";
import * as path from "node:path";
import {
	MapperConfig,
	type MapperConfigShape,
	resolveMapperConfig,
} from "@docmapper/core";
import { Data, Effect, Layer, ParseResult } from "effect";

// ============================================================================
// Config Loading Errors
// ============================================================================

/**
 * The config file could not be read or is not valid JSON.
 */
export class ConfigLoadError extends Data.TaggedError("ConfigLoadError")<{
	readonly configPath: string;
	readonly reason: string;
	readonly message: string;
}> {}

/**
 * The config file was read but its contents are not a mapper config.
 */
export class ConfigValidationError extends Data.TaggedError(
	"ConfigValidationError",
)<{
	readonly configPath: string;
	readonly reason: string;
	readonly message: string;
}> {}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

// ============================================================================
// Loading
// ============================================================================

const readJson = (configPath: string): Effect.Effect<unknown, ConfigLoadError> =>
	Effect.gen(function* () {
		const content = yield* Effect.tryPromise({
			try: () => fs.readFile(configPath, "utf-8"),
			catch: (error) =>
				new ConfigLoadError({
					configPath,
					reason: `Failed to read config: ${errorMessage(error)}`,
					message: `Failed to load config from ${configPath}: ${errorMessage(error)}`,
				}),
		});
		return yield* Effect.try({
			try: (): unknown => JSON.parse(content),
			catch: (error) =>
				new ConfigLoadError({
					configPath,
					reason: `Failed to parse JSON config: ${errorMessage(error)}`,
					message: `Failed to load config from ${configPath}: ${errorMessage(error)}`,
				}),
		});
	});

/**
 * Reads a JSON mapper config. Keys missing from the file keep their
 * defaults.
 */
export const loadMapperConfig = (
	configPath: string,
): Effect.Effect<MapperConfigShape, ConfigLoadError | ConfigValidationError> =>
	Effect.gen(function* () {
		const absolute = path.resolve(configPath);
		const raw = yield* readJson(absolute);
		if (!isRecord(raw)) {
			return yield* Effect.fail(
				new ConfigValidationError({
					configPath: absolute,
					reason: "Config must be an object",
					message: `Invalid config in ${absolute}: Config must be an object, got ${Array.isArray(raw) ? "array" : typeof raw}`,
				}),
			);
		}
		const config = yield* resolveMapperConfig(raw).pipe(
			Effect.mapError((error) => {
				const reason = ParseResult.TreeFormatter.formatErrorSync(error);
				return new ConfigValidationError({
					configPath: absolute,
					reason,
					message: `Invalid config in ${absolute}: ${reason}`,
				});
			}),
		);
		yield* Effect.logDebug("mapper config loaded").pipe(
			Effect.annotateLogs({ configPath: absolute, database: config.database }),
		);
		return config;
	});

export const makeMapperConfigFileLayer = (
	configPath: string,
): Layer.Layer<MapperConfig, ConfigLoadError | ConfigValidationError> =>
	Layer.effect(MapperConfig, loadMapperConfig(configPath));
