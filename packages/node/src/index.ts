/**
 * @docmapper/node - Node.js integration for docmapper
 *
 * Re-exports everything from @docmapper/core plus the file-backed metadata
 * cache and config loading.
 */

// Re-export everything from core
export * from "@docmapper/core";
export {
	ConfigLoadError,
	ConfigValidationError,
	loadMapperConfig,
	makeMapperConfigFileLayer,
} from "./config-loader.js";
export {
	FileMetadataCacheLayer,
	type FileMetadataCache,
	makeFileMetadataCache,
	makeFileMetadataCacheLayer,
} from "./file-metadata-cache-layer.js";
export {
	makeNodeDocumentMapperLayer,
	type NodeDocumentMapperOptions,
} from "./node-mapper-layer.js";
