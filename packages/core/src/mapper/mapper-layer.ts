import { Layer } from "effect";
import {
	InMemoryMetadataCacheLayer,
	type MetadataCache,
} from "../cache/metadata-cache.js";
import {
	type MapperConfig,
	type MapperConfigShape,
	makeMapperConfigLayer,
} from "../config/mapper-config.js";
import type { TypeIntrospector } from "../introspection/type-introspector.js";
import {
	type MetadataRegistry,
	MetadataRegistryLive,
} from "../metadata/metadata-registry.js";
import type { DocumentTransport } from "../transport/document-transport.js";
import {
	makeValidatorRegistryLayer,
	type Predicate,
	type ValidatorRegistry,
} from "../validation/validator-registry.js";
import { type DocumentMapper, DocumentMapperLive } from "./document-mapper.js";

export interface DocumentMapperLayerOptions {
	readonly introspector: Layer.Layer<TypeIntrospector>;
	readonly transport: Layer.Layer<DocumentTransport>;
	/** Defaults to a fresh in-memory cache. */
	readonly cache?: Layer.Layer<MetadataCache>;
	readonly config?: Partial<MapperConfigShape>;
	/** Extra validation predicates, by name. */
	readonly validators?: Readonly<Record<string, Predicate>>;
}

export type DocumentMapperServices =
	| DocumentMapper
	| MetadataRegistry
	| MetadataCache
	| MapperConfig
	| ValidatorRegistry
	| TypeIntrospector
	| DocumentTransport;

/**
 * Wires the mapper with its registry and collaborators. Every service stays
 * available to the caller.
 */
export const makeDocumentMapperLayer = (
	options: DocumentMapperLayerOptions,
): Layer.Layer<DocumentMapperServices> => {
	const collaborators = Layer.mergeAll(
		options.introspector,
		options.transport,
		options.cache ?? InMemoryMetadataCacheLayer,
		makeMapperConfigLayer(options.config),
		makeValidatorRegistryLayer(options.validators),
	);
	const registry = MetadataRegistryLive.pipe(Layer.provideMerge(collaborators));
	return DocumentMapperLive.pipe(Layer.provideMerge(registry));
};
