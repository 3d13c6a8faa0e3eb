/**
 * Builds a SchemaDefinition from a type description and its annotations.
 *
 * Steps:
 * 1. Walk the ancestor chain through the registry; the first single-collection
 *    ancestor lends its collection name and stops the walk
 * 2. Otherwise use an explicit collection annotation or the lower-cased plural
 *    of the simple type name
 * 3. Build property definitions, picking up the identifier
 * 4. Declare one index per index/unique property annotation
 * 5. Register scopes and lifecycle hooks from methods
 * 6. Synthesize an `_id`/`id` identifier when none was declared
 * 7. Build the constructor-bypassing prototype instance
 */

import { Effect } from "effect";
import pluralize from "pluralize";
import { MapperConfig } from "../config/mapper-config.js";
import { ConfigurationError } from "../errors/mapping-errors.js";
import { TypeIntrospector } from "../introspection/type-introspector.js";
import {
	type Annotation,
	type AnnotationArg,
	isAnnotation,
	type MethodDescription,
	type PropertyDescription,
	type TypeDescription,
} from "../types/annotation-types.js";
import {
	type EventHook,
	type EventKind,
	type IndexDef,
	type PropertyDef,
	type ReferenceSpec,
	type SchemaDefinition,
	type ScopeRef,
	TypeDescriptor,
	type ValidationRule,
} from "../types/schema-types.js";
import { eventKindOf } from "./event-aliases.js";
import { defineIndex } from "./index-definition.js";
import { descriptorOf } from "./type-descriptor.js";

// ============================================================================
// Annotation helpers
// ============================================================================

const named = (annotations: ReadonlyArray<Annotation>, ...names: ReadonlyArray<string>) =>
	annotations.filter((annotation) => names.includes(annotation.name.toLowerCase()));

const has = (annotations: ReadonlyArray<Annotation>, ...names: ReadonlyArray<string>) =>
	named(annotations, ...names).length > 0;

const firstStringArg = (annotation: Annotation | undefined): string | undefined => {
	const arg = annotation?.args[0];
	return typeof arg === "string" ? arg : undefined;
};

export const simpleTypeName = (typeName: string): string =>
	typeName.split(/[.\\/]/).pop() ?? typeName;

export const defaultCollectionName = (typeName: string): string =>
	pluralize(simpleTypeName(typeName)).toLowerCase();

const validationRules = (
	annotations: ReadonlyArray<Annotation>,
): ReadonlyArray<ValidationRule> =>
	named(annotations, "validate").flatMap((annotation) =>
		annotation.args.flatMap((arg): ReadonlyArray<ValidationRule> => {
			if (typeof arg === "string") {
				return [{ predicate: arg, args: [] }];
			}
			if (isAnnotation(arg)) {
				return [{ predicate: arg.name, args: arg.args }];
			}
			return [];
		}),
	);

const stringList = (arg: AnnotationArg | undefined): ReadonlyArray<string> => {
	if (typeof arg === "string") {
		return [arg];
	}
	if (Array.isArray(arg)) {
		const items: ReadonlyArray<AnnotationArg> = arg;
		return items.filter((item): item is string => typeof item === "string");
	}
	return [];
};

const referenceSpec = (annotations: ReadonlyArray<Annotation>): ReferenceSpec => {
	const [annotation] = named(annotations, "reference");
	if (!annotation) {
		return false;
	}
	const withFields = stringList(annotation.options.with ?? annotation.args[0]);
	return { withFields: [...new Set(withFields)] };
};

const isDescending = (annotation: Annotation): boolean => {
	const { asc, desc } = annotation.options;
	if (desc !== undefined) {
		return Boolean(desc);
	}
	if (asc !== undefined) {
		return !asc;
	}
	return annotation.args.some((arg) => typeof arg === "string" && arg.toLowerCase() === "desc");
};

const isSparse = (annotation: Annotation): boolean =>
	Boolean(annotation.options.sparse) ||
	annotation.args.some((arg) => typeof arg === "string" && arg.toLowerCase() === "sparse");

const propertyIndex = (
	storedName: string,
	annotations: ReadonlyArray<Annotation>,
): IndexDef | undefined => {
	const [annotation] = named(annotations, "index", "unique");
	if (!annotation) {
		return undefined;
	}
	return defineIndex({
		key: [{ field: storedName, direction: isDescending(annotation) ? "desc" : "asc" }],
		unique: annotation.name.toLowerCase() === "unique",
		sparse: isSparse(annotation),
		background: true,
	});
};

const syntheticId: PropertyDef = {
	storedName: "_id",
	fieldName: "id",
	type: TypeDescriptor.id,
	required: false,
	validations: [],
	visibility: "public",
	reference: false,
	annotations: [],
};

// ============================================================================
// Collection resolution
// ============================================================================

interface CollectionInfo {
	readonly collectionName: string | undefined;
	readonly hasOwnCollection: boolean;
	readonly watched: ReadonlySet<string>;
}

const resolveInheritedCollection = <E, R>(
	description: TypeDescription,
	resolve: (typeName: string) => Effect.Effect<SchemaDefinition, E, R>,
): Effect.Effect<CollectionInfo, E | ConfigurationError, R | TypeIntrospector> =>
	Effect.gen(function* () {
		const introspector = yield* TypeIntrospector;
		const watched = new Set<string>(description.source ? [description.source] : []);
		let parentName = description.parent;
		while (parentName !== null) {
			const parent = yield* resolve(parentName);
			for (const source of parent.watchedSources) {
				watched.add(source);
			}
			if (parent.singleCollectionRoot) {
				return {
					collectionName: parent.collectionName,
					hasOwnCollection: false,
					watched,
				};
			}
			parentName = (yield* introspector.describe(parentName)).parent;
		}
		return { collectionName: undefined, hasOwnCollection: true, watched };
	});

// ============================================================================
// Members
// ============================================================================

interface PropertyResult {
	readonly definition: PropertyDef;
	readonly isId: boolean;
	readonly index: IndexDef | undefined;
}

const buildProperty = (
	property: PropertyDescription,
	idAlreadyDeclared: boolean,
): PropertyResult => {
	const { annotations } = property;
	const isId = !idAlreadyDeclared && has(annotations, "id");
	const storedName = isId
		? "_id"
		: (firstStringArg(named(annotations, "field")[0]) ?? property.name);

	return {
		isId,
		index: propertyIndex(storedName, annotations),
		definition: {
			storedName,
			fieldName: property.name,
			type: descriptorOf(annotations),
			required: has(annotations, "required"),
			validations: validationRules(annotations),
			visibility: property.visibility,
			reference: referenceSpec(annotations),
			annotations,
		},
	};
};

const SCOPE_PATTERN = /^scope(.+)$/i;

const collectScopes = (
	methods: ReadonlyArray<MethodDescription>,
): ReadonlyMap<string, ScopeRef> => {
	const scopes = new Map<string, ScopeRef>();
	for (const method of methods) {
		const match = SCOPE_PATTERN.exec(method.name);
		const scopeName = match?.[1];
		if (scopeName !== undefined) {
			scopes.set(scopeName.toLowerCase(), {
				method: method.name,
				arity: Math.max(0, method.parameterCount - 1),
			});
		}
	}
	return scopes;
};

const collectEvents = (
	methods: ReadonlyArray<MethodDescription>,
): ReadonlyMap<EventKind, ReadonlyArray<EventHook>> => {
	const events = new Map<EventKind, Array<EventHook>>();
	for (const method of methods) {
		for (const annotation of method.annotations) {
			const kind = eventKindOf(annotation.name);
			if (kind === undefined) {
				continue;
			}
			const hooks = events.get(kind) ?? [];
			hooks.push({
				method: method.name,
				visibility: method.visibility,
				args: annotation.args,
			});
			events.set(kind, hooks);
		}
	}
	return events;
};

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extracts the schema of `typeName`. Ancestor definitions are obtained through
 * `resolve`, which is the registry's own `of`.
 */
export const extractSchema = <E, R>(
	typeName: string,
	resolve: (typeName: string) => Effect.Effect<SchemaDefinition, E, R>,
): Effect.Effect<
	SchemaDefinition,
	E | ConfigurationError,
	R | TypeIntrospector | MapperConfig
> =>
	Effect.gen(function* () {
		const introspector = yield* TypeIntrospector;
		const config = yield* MapperConfig;
		const description = yield* introspector.describe(typeName);

		const inherited = yield* resolveInheritedCollection(description, resolve);
		const collectionName =
			inherited.collectionName ??
			firstStringArg(named(description.annotations, "collection", "table", "persist")[0]) ??
			defaultCollectionName(description.name);

		const byField = new Map<string, PropertyDef>();
		const byStored = new Map<string, PropertyDef>();
		const indexes: Array<IndexDef> = [];
		let idPropertyKey: string | undefined;

		for (const property of description.properties) {
			if (
				property.visibility !== "public" &&
				property.name.startsWith(config.internalPrefix)
			) {
				continue;
			}
			const result = buildProperty(property, idPropertyKey !== undefined);
			const { storedName, fieldName } = result.definition;
			if (byStored.has(storedName)) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "duplicate-stored-name",
						message: `Property ${fieldName} of ${typeName} reuses stored name '${storedName}'`,
					}),
				);
			}
			if (result.isId) {
				idPropertyKey = fieldName;
			}
			if (result.index) {
				indexes.push(result.index);
			}
			byField.set(fieldName, result.definition);
			byStored.set(storedName, result.definition);
		}

		if (idPropertyKey === undefined) {
			if (byField.has(syntheticId.fieldName) || byStored.has(syntheticId.storedName)) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "ambiguous-identifier",
						message: `${typeName} declares 'id' or '_id' without marking it as the identifier`,
					}),
				);
			}
			idPropertyKey = syntheticId.fieldName;
			byField.set(syntheticId.fieldName, syntheticId);
			byStored.set(syntheticId.storedName, syntheticId);
		}

		const prototype = description.prototype;
		const definition: SchemaDefinition = {
			typeName: description.name,
			collectionName,
			singleCollectionRoot: has(description.annotations, "singlecollection"),
			hasOwnCollection: inherited.hasOwnCollection,
			idPropertyKey,
			propertiesByFieldName: byField,
			propertiesByStoredName: byStored,
			indexes,
			events: collectEvents(description.methods),
			scopes: collectScopes(description.methods),
			observers: [],
			watchedSources: inherited.watched,
			prototypeInstance: description.isAbstract ? null : Object.create(prototype),
			instantiate: () => Object.create(prototype),
			construct: description.construct,
		};

		yield* Effect.logDebug("schema extracted").pipe(
			Effect.annotateLogs({
				typeName: definition.typeName,
				collection: definition.collectionName,
				properties: byField.size,
				indexes: indexes.length,
			}),
		);

		return definition;
	});
