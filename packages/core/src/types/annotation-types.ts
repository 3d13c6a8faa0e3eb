/**
 * Declarative annotation model consumed by the schema extractor.
 *
 * An annotation is a name plus positional and keyword arguments. Arguments
 * may themselves be annotations, which is how `array(int())` or
 * `validate(between(0, 99))` nest.
 */

// ============================================================================
// Annotation Values
// ============================================================================

export type AnnotationArg =
	| string
	| number
	| boolean
	| null
	| Annotation
	| ReadonlyArray<AnnotationArg>;

export interface Annotation {
	readonly _tag: "Annotation";
	readonly name: string;
	readonly args: ReadonlyArray<AnnotationArg>;
	readonly options: Readonly<Record<string, AnnotationArg>>;
}

export const isAnnotation = (value: unknown): value is Annotation =>
	typeof value === "object" &&
	value !== null &&
	"_tag" in value &&
	value._tag === "Annotation";

// ============================================================================
// Type Descriptions (Type Introspector output)
// ============================================================================

export type Visibility = "public" | "private";

export interface PropertyDescription {
	readonly name: string;
	readonly visibility: Visibility;
	readonly annotations: ReadonlyArray<Annotation>;
}

export interface MethodDescription {
	readonly name: string;
	readonly visibility: Visibility;
	/** Declared parameter count, including the leading query receiver of scopes. */
	readonly parameterCount: number;
	readonly annotations: ReadonlyArray<Annotation>;
}

/**
 * Read-only view of one mapped type, as returned by a TypeIntrospector.
 */
export interface TypeDescription {
	readonly name: string;
	readonly parent: string | null;
	readonly isAbstract: boolean;
	/** Artifact (usually a module path) whose change invalidates cached metadata. */
	readonly source: string | null;
	readonly annotations: ReadonlyArray<Annotation>;
	readonly properties: ReadonlyArray<PropertyDescription>;
	readonly methods: ReadonlyArray<MethodDescription>;
	/** Prototype used to build instances without running the constructor. */
	readonly prototype: object;
	/** Runs the constructor with no arguments. Used for observer types. */
	readonly construct: () => object;
}
