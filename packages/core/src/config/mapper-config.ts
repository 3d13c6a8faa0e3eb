import { Context, Effect, Layer, type ParseResult, Schema } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export const MapperConfigSchema = Schema.Struct({
	/** Connection name reported in save-command targets. */
	connection: Schema.String,
	/** Database name; `<database>.<collection>` forms the namespace. */
	database: Schema.String,
	/** Field names starting with this prefix are never persisted. */
	internalPrefix: Schema.String.pipe(Schema.minLength(1)),
	/** Submit declared indexes when a definition is built. */
	createIndexes: Schema.Boolean,
});

export type MapperConfigShape = typeof MapperConfigSchema.Type;

export const defaultMapperConfig: MapperConfigShape = {
	connection: "default",
	database: "app",
	internalPrefix: "__",
	createIndexes: true,
};

export class MapperConfig extends Context.Tag("MapperConfig")<
	MapperConfig,
	MapperConfigShape
>() {}

/**
 * Decodes overrides layered on top of the defaults. Keys set to `undefined`
 * keep their default.
 */
export const resolveMapperConfig = (
	overrides: Readonly<Record<string, unknown>> = {},
): Effect.Effect<MapperConfigShape, ParseResult.ParseError> => {
	const merged: Record<string, unknown> = { ...defaultMapperConfig };
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) {
			merged[key] = value;
		}
	}
	return Schema.decodeUnknown(MapperConfigSchema)(merged);
};

export const makeMapperConfigLayer = (
	overrides: Partial<MapperConfigShape> = {},
): Layer.Layer<MapperConfig> =>
	Layer.effect(MapperConfig, Effect.orDie(resolveMapperConfig(overrides)));

export const MapperConfigLive: Layer.Layer<MapperConfig> =
	Layer.succeed(MapperConfig, defaultMapperConfig);
