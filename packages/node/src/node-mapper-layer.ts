/**
 * DocumentMapper wiring for Node.js: metadata is cached against source file
 * modification times and the mapper config is read from a JSON file.
 */

import {
	type DocumentMapperLayerOptions,
	type DocumentMapperServices,
	type MapperConfigShape,
	makeDocumentMapperLayer,
} from "@docmapper/core";
import { Effect, Layer } from "effect";
import {
	type ConfigLoadError,
	type ConfigValidationError,
	loadMapperConfig,
} from "./config-loader.js";
import { FileMetadataCacheLayer } from "./file-metadata-cache-layer.js";

export interface NodeDocumentMapperOptions
	extends Omit<DocumentMapperLayerOptions, "cache" | "config"> {
	/** JSON mapper config; defaults apply when omitted. */
	readonly configPath?: string;
}

export const makeNodeDocumentMapperLayer = (
	options: NodeDocumentMapperOptions,
): Layer.Layer<DocumentMapperServices, ConfigLoadError | ConfigValidationError> => {
	const { configPath, ...rest } = options;
	const config: Effect.Effect<
		Partial<MapperConfigShape>,
		ConfigLoadError | ConfigValidationError
	> = configPath === undefined ? Effect.succeed({}) : loadMapperConfig(configPath);
	return Layer.unwrapEffect(
		Effect.map(config, (resolved) =>
			makeDocumentMapperLayer({ ...rest, cache: FileMetadataCacheLayer, config: resolved }),
		),
	);
};
