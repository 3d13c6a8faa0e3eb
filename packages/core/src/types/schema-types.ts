/**
 * Metadata model built once per mapped type.
 */

import type {
	Annotation,
	AnnotationArg,
	Visibility,
} from "./annotation-types.js";

// ============================================================================
// Type Descriptors
// ============================================================================

export type ScalarKind = "int" | "float" | "bool" | "string" | "object";

export type TypeDescriptor =
	| { readonly _tag: "Scalar"; readonly kind: ScalarKind }
	| { readonly _tag: "Array"; readonly element: TypeDescriptor }
	| { readonly _tag: "ClassType"; readonly typeName: string }
	| { readonly _tag: "Id" }
	| { readonly _tag: "Untyped" };

const idDescriptor: TypeDescriptor = { _tag: "Id" };
const untypedDescriptor: TypeDescriptor = { _tag: "Untyped" };

export const TypeDescriptor = {
	scalar: (kind: ScalarKind): TypeDescriptor => ({ _tag: "Scalar", kind }),
	array: (element: TypeDescriptor): TypeDescriptor => ({ _tag: "Array", element }),
	classType: (typeName: string): TypeDescriptor => ({
		_tag: "ClassType",
		typeName,
	}),
	id: idDescriptor,
	untyped: untypedDescriptor,
} as const;

// ============================================================================
// Properties
// ============================================================================

export interface ValidationRule {
	readonly predicate: string;
	readonly args: ReadonlyArray<AnnotationArg>;
}

export type ReferenceSpec = false | { readonly withFields: ReadonlyArray<string> };

export interface PropertyDef {
	readonly storedName: string;
	readonly fieldName: string;
	readonly type: TypeDescriptor;
	readonly required: boolean;
	readonly validations: ReadonlyArray<ValidationRule>;
	readonly visibility: Visibility;
	readonly reference: ReferenceSpec;
	readonly annotations: ReadonlyArray<Annotation>;
}

// ============================================================================
// Indexes
// ============================================================================

export type IndexDirection = "asc" | "desc";

export interface IndexKey {
	readonly field: string;
	readonly direction: IndexDirection;
}

export interface IndexDef {
	readonly key: ReadonlyArray<IndexKey>;
	readonly unique: boolean;
	readonly sparse: boolean;
	readonly background: boolean;
	readonly name: string;
}

// ============================================================================
// Events, Scopes, Observers
// ============================================================================

export type EventKind =
	| "retrieved"
	| "creating"
	| "created"
	| "updating"
	| "updated"
	| "saving"
	| "saved"
	| "deleting"
	| "deleted";

export interface EventHook {
	readonly method: string;
	readonly visibility: Visibility;
	readonly args: ReadonlyArray<AnnotationArg>;
}

export interface ScopeRef {
	readonly method: string;
	/** Parameter count without the query receiver. */
	readonly arity: number;
}

/**
 * An observer is any object; methods named after an event alias are called
 * with the affected object.
 */
export type Observer = object;

// ============================================================================
// Schema Definition
// ============================================================================

export interface SchemaDefinition {
	readonly typeName: string;
	readonly collectionName: string;
	readonly singleCollectionRoot: boolean;
	readonly hasOwnCollection: boolean;
	readonly idPropertyKey: string;
	readonly propertiesByFieldName: ReadonlyMap<string, PropertyDef>;
	readonly propertiesByStoredName: ReadonlyMap<string, PropertyDef>;
	readonly indexes: ReadonlyArray<IndexDef>;
	readonly events: ReadonlyMap<EventKind, ReadonlyArray<EventHook>>;
	readonly scopes: ReadonlyMap<string, ScopeRef>;
	/** Appended at run time by observer registration. */
	readonly observers: Array<Observer>;
	readonly watchedSources: ReadonlySet<string>;
	readonly prototypeInstance: object | null;
	/** Builds an instance of the type without running its constructor. */
	readonly instantiate: () => object;
	/** Runs the constructor with no arguments; may throw. */
	readonly construct: () => object;
}
