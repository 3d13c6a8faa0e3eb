import { Data } from "effect";

// ============================================================================
// Effect TaggedError Mapping Error Types
// ============================================================================

/**
 * Raised for declarations the engine cannot work with: unknown types,
 * hooks on non-public methods, unknown observers, predicates or scopes,
 * and cyclic embedded object graphs. Never retried.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
	readonly typeName: string;
	readonly reason: string;
	readonly message: string;
}> {}

export type ValidationErrorKind = "MissingRequired" | "PredicateFailed";

export class ValidationError extends Data.TaggedError("ValidationError")<{
	readonly kind: ValidationErrorKind;
	readonly typeName: string;
	readonly field: string;
	readonly value?: unknown;
	readonly predicate?: string;
	readonly message: string;
}> {}

/**
 * A reference whose target document no longer exists. Only surfaced when the
 * reference is resolved.
 */
export class ReferenceResolutionError extends Data.TaggedError(
	"ReferenceResolutionError",
)<{
	readonly collection: string;
	readonly id: string;
	readonly message: string;
}> {}

export class DocumentNotFoundError extends Data.TaggedError(
	"DocumentNotFoundError",
)<{
	readonly collection: string;
	readonly selector: string;
	readonly message: string;
}> {}

export class HookError extends Data.TaggedError("HookError")<{
	readonly event: string;
	readonly method: string;
	readonly typeName: string;
	readonly reason: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

// ============================================================================
// Mapping Error Union
// ============================================================================

export type MappingError =
	| ConfigurationError
	| ValidationError
	| ReferenceResolutionError
	| DocumentNotFoundError
	| HookError;
