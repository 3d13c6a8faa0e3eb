/**
 * Main entry point for the docmapper core library.
 *
 * Exports the Effect-based API: typed errors, the annotation vocabulary,
 * metadata extraction and registry, serialization, hydration, diffing,
 * lifecycle events and the DocumentMapper service.
 */

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	ConfigurationError,
	DocumentNotFoundError,
	HookError,
	ReferenceResolutionError,
	TransportError,
	ValidationError,
} from "./errors/index.js";

export type {
	DocumentMapperError,
	MappingError,
	ValidationErrorKind,
} from "./errors/index.js";

// ============================================================================
// Annotations and Type Introspection
// ============================================================================

export * as Annotations from "./annotations/vocabulary.js";
export type { IndexAnnotationOptions } from "./annotations/vocabulary.js";

export { isAnnotation } from "./types/annotation-types.js";
export type {
	Annotation,
	AnnotationArg,
	MethodDescription,
	PropertyDescription,
	TypeDescription,
	Visibility,
} from "./types/annotation-types.js";

export {
	TypeIntrospector,
	type TypeIntrospectorShape,
} from "./introspection/type-introspector.js";
export {
	makeTypeCatalogLayer,
	TypeCatalog,
} from "./introspection/type-catalog.js";
export type {
	MappedClass,
	MemberDeclaration,
	TypeDeclaration,
} from "./introspection/type-catalog.js";

// ============================================================================
// Schema Metadata
// ============================================================================

export { TypeDescriptor } from "./types/schema-types.js";
export type {
	EventHook,
	EventKind,
	IndexDef,
	IndexDirection,
	IndexKey,
	Observer,
	PropertyDef,
	ReferenceSpec,
	ScalarKind,
	SchemaDefinition,
	ScopeRef,
	ValidationRule,
} from "./types/schema-types.js";

export {
	defaultCollectionName,
	extractSchema,
	simpleTypeName,
} from "./metadata/schema-extractor.js";
export { defineIndex, indexName, toIndexSpec } from "./metadata/index-definition.js";
export { EVENT_ALIASES, EVENT_KINDS, eventKindOf } from "./metadata/event-aliases.js";
export {
	makeMetadataRegistry,
	MetadataRegistry,
	MetadataRegistryLive,
	type MetadataRegistryShape,
	type RegistryError,
} from "./metadata/metadata-registry.js";

// ============================================================================
// Metadata Cache
// ============================================================================

export {
	InMemoryMetadataCacheLayer,
	makeInMemoryMetadataCache,
	makeInMemoryMetadataCacheLayer,
	MetadataCache,
} from "./cache/metadata-cache.js";
export type {
	Cacheable,
	InMemoryMetadataCache,
	MetadataCacheShape,
} from "./cache/metadata-cache.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	defaultMapperConfig,
	makeMapperConfigLayer,
	MapperConfig,
	MapperConfigLive,
	MapperConfigSchema,
	resolveMapperConfig,
	type MapperConfigShape,
} from "./config/mapper-config.js";

// ============================================================================
// Documents, Serialization and Hydration
// ============================================================================

export type {
	CommandResult,
	CommandTarget,
	CreateCommand,
	DeleteStatement,
	IndexSpec,
	SaveCommand,
	Selector,
	StoredDocument,
	StoredValue,
	TransportCommand,
	UpdateCommand,
	UpdateDocument,
	UpdateStatement,
} from "./types/document-types.js";

export { ObjectId } from "bson";
export { isReferenceShape, Reference, type ReferencePointer } from "./mapping/reference.js";
export {
	toDocument,
	toFieldValues,
	type PersistReference,
	type SerializeOptions,
	type SerializeRequirements,
} from "./mapping/serializer.js";
export { newInstance, recordedTypeName } from "./mapping/hydrator.js";
export {
	clearSnapshot,
	lastPersistedDocument,
} from "./mapping/snapshot-store.js";
export {
	cloneDocument,
	isStoreNative,
	storedValuesEqual,
} from "./utils/stored-values.js";

// ============================================================================
// Diff Engine
// ============================================================================

export { applyDiff, diff, isEmptyUpdate } from "./diff/document-diff.js";
export { snapshot } from "./diff/snapshot.js";
export { commandTarget, getSaveCommand } from "./diff/save-command.js";

// ============================================================================
// Validation
// ============================================================================

export { validateProperty } from "./validation/validate-property.js";
export {
	builtinPredicates,
	makeValidatorRegistryLayer,
	ValidatorRegistry,
	ValidatorRegistryLive,
	type Predicate,
	type ValidatorRegistryShape,
} from "./validation/validator-registry.js";

// ============================================================================
// Events
// ============================================================================

export { registerObserver, triggerEvent } from "./events/event-dispatcher.js";

// ============================================================================
// Query Filter
// ============================================================================

export { isQueryFilter, QueryFilter } from "./query/query-filter.js";

// ============================================================================
// Transport
// ============================================================================

export {
	DocumentTransport,
	type DocumentTransportShape,
} from "./transport/document-transport.js";
export {
	makeInMemoryTransport,
	makeInMemoryTransportLayer,
	type InMemoryTransport,
} from "./transport/in-memory-transport-layer.js";

// ============================================================================
// Document Mapper
// ============================================================================

export {
	DocumentMapper,
	DocumentMapperLive,
	makeDocumentMapper,
	type BulkOptions,
	type Criteria,
	type DocumentMapperShape,
} from "./mapper/document-mapper.js";
export {
	makeDocumentMapperLayer,
	type DocumentMapperLayerOptions,
	type DocumentMapperServices,
} from "./mapper/mapper-layer.js";
