// ============================================================================
// Mapping Errors (re-exported from mapping-errors.ts)
// ============================================================================

export type { MappingError, ValidationErrorKind } from "./mapping-errors.js";
export {
	ConfigurationError,
	DocumentNotFoundError,
	HookError,
	ReferenceResolutionError,
	ValidationError,
} from "./mapping-errors.js";

// ============================================================================
// Transport Errors (re-exported from transport-errors.ts)
// ============================================================================

export { TransportError } from "./transport-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { MappingError } from "./mapping-errors.js";
import type { TransportError } from "./transport-errors.js";

export type DocumentMapperError = MappingError | TransportError;
