import { Context, type Effect, type Option } from "effect";
import type { ConfigurationError } from "../errors/mapping-errors.js";
import type { TypeDescription } from "../types/annotation-types.js";

// ============================================================================
// TypeIntrospector Effect Service
// ============================================================================

export interface TypeIntrospectorShape {
	/** Fails with ConfigurationError when the type is unknown. */
	readonly describe: (
		typeName: string,
	) => Effect.Effect<TypeDescription, ConfigurationError>;
	/** Mapped type name of a live object, if its class is known. */
	readonly typeNameOf: (value: object) => Option.Option<string>;
}

export class TypeIntrospector extends Context.Tag("TypeIntrospector")<
	TypeIntrospector,
	TypeIntrospectorShape
>() {}
