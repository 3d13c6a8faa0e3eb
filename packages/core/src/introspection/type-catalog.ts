/**
 * Declarative TypeIntrospector implementation.
 *
 * Classes are registered together with their annotations. Methods are read
 * from the prototype chain; properties cannot be discovered at run time in
 * JavaScript, so they are declared. A type reports the properties and method
 * annotations of its registered ancestors as well as its own, the way class
 * reflection exposes inherited members.
 */

import { Effect, Layer, Option } from "effect";
import { ConfigurationError } from "../errors/mapping-errors.js";
import type {
	Annotation,
	MethodDescription,
	PropertyDescription,
	TypeDescription,
	Visibility,
} from "../types/annotation-types.js";
import {
	TypeIntrospector,
	type TypeIntrospectorShape,
} from "./type-introspector.js";

// ============================================================================
// Declarations
// ============================================================================

export type MappedClass = abstract new (...args: never[]) => object;

export type MemberDeclaration =
	| ReadonlyArray<Annotation>
	| {
			readonly visibility?: Visibility;
			readonly annotations?: ReadonlyArray<Annotation>;
	  };

export interface TypeDeclaration {
	/** Fully qualified type name. Defaults to the class name. */
	readonly name?: string;
	/** Artifact whose change invalidates cached metadata for this type. */
	readonly source?: string;
	readonly abstract?: boolean;
	readonly annotations?: ReadonlyArray<Annotation>;
	readonly properties?: Readonly<Record<string, MemberDeclaration>>;
	readonly methods?: Readonly<Record<string, MemberDeclaration>>;
}

interface CatalogEntry {
	readonly name: string;
	readonly ctor: MappedClass;
	readonly declaration: TypeDeclaration;
}

const normalizeMember = (
	declaration: MemberDeclaration,
): { visibility: Visibility; annotations: ReadonlyArray<Annotation> } =>
	Array.isArray(declaration)
		? { visibility: "public", annotations: declaration }
		: {
				visibility:
					"visibility" in declaration && declaration.visibility
						? declaration.visibility
						: "public",
				annotations:
					"annotations" in declaration && declaration.annotations
						? declaration.annotations
						: [],
			};

// ============================================================================
// TypeCatalog
// ============================================================================

export class TypeCatalog {
	private readonly byName = new Map<string, CatalogEntry>();
	private readonly byConstructor = new Map<Function, CatalogEntry>();

	declare<C extends MappedClass>(ctor: C, declaration: TypeDeclaration = {}): this {
		const entry: CatalogEntry = {
			name: declaration.name ?? ctor.name,
			ctor,
			declaration,
		};
		this.byName.set(entry.name, entry);
		this.byConstructor.set(ctor, entry);
		return this;
	}

	has(typeName: string): boolean {
		return this.byName.has(typeName);
	}

	typeNameOf(value: object): Option.Option<string> {
		let proto: unknown = Object.getPrototypeOf(value);
		while (typeof proto === "object" && proto !== null) {
			const ctor: unknown = Reflect.get(proto, "constructor");
			if (typeof ctor === "function") {
				const entry = this.byConstructor.get(ctor);
				if (entry) {
					return Option.some(entry.name);
				}
			}
			proto = Object.getPrototypeOf(proto);
		}
		return Option.none();
	}

	/** Registered ancestors, nearest first. */
	private ancestorsOf(entry: CatalogEntry): ReadonlyArray<CatalogEntry> {
		const ancestors: Array<CatalogEntry> = [];
		let current: unknown = Object.getPrototypeOf(entry.ctor);
		while (typeof current === "function" && current !== Function.prototype) {
			const found = this.byConstructor.get(current);
			if (found) {
				ancestors.push(found);
			}
			current = Object.getPrototypeOf(current);
		}
		return ancestors;
	}

	private collectProperties(
		chain: ReadonlyArray<CatalogEntry>,
	): ReadonlyArray<PropertyDescription> {
		const properties = new Map<string, PropertyDescription>();
		for (const entry of chain) {
			for (const [name, member] of Object.entries(
				entry.declaration.properties ?? {},
			)) {
				properties.set(name, { name, ...normalizeMember(member) });
			}
		}
		return [...properties.values()];
	}

	private collectMethods(
		entry: CatalogEntry,
		chain: ReadonlyArray<CatalogEntry>,
	): ReadonlyArray<MethodDescription> {
		const declared = new Map<
			string,
			{ visibility: Visibility; annotations: ReadonlyArray<Annotation> }
		>();
		for (const link of chain) {
			for (const [name, member] of Object.entries(
				link.declaration.methods ?? {},
			)) {
				declared.set(name, normalizeMember(member));
			}
		}

		const methods = new Map<string, MethodDescription>();
		let proto: unknown = entry.ctor.prototype;
		while (
			typeof proto === "object" &&
			proto !== null &&
			proto !== Object.prototype
		) {
			for (const name of Object.getOwnPropertyNames(proto)) {
				if (name === "constructor" || methods.has(name)) {
					continue;
				}
				const descriptor = Object.getOwnPropertyDescriptor(proto, name);
				if (!descriptor || typeof descriptor.value !== "function") {
					continue;
				}
				const member = declared.get(name);
				methods.set(name, {
					name,
					visibility: member?.visibility ?? "public",
					parameterCount: descriptor.value.length,
					annotations: member?.annotations ?? [],
				});
			}
			proto = Object.getPrototypeOf(proto);
		}
		return [...methods.values()];
	}

	describe(typeName: string): Option.Option<TypeDescription> {
		const entry = this.byName.get(typeName);
		if (!entry) {
			return Option.none();
		}
		const ancestors = this.ancestorsOf(entry);
		// Oldest ancestor first, so nearer declarations override.
		const chain = [...ancestors].reverse().concat(entry);
		const ctor = entry.ctor;
		const prototype: object = ctor.prototype;

		return Option.some({
			name: entry.name,
			parent: ancestors[0]?.name ?? null,
			isAbstract: entry.declaration.abstract ?? false,
			source: entry.declaration.source ?? null,
			annotations: entry.declaration.annotations ?? [],
			properties: this.collectProperties(chain),
			methods: this.collectMethods(entry, chain),
			prototype,
			construct: (): object => Reflect.construct(ctor, []),
		});
	}

	toIntrospector(): TypeIntrospectorShape {
		return {
			describe: (typeName) =>
				Option.match(this.describe(typeName), {
					onNone: () =>
						Effect.fail(
							new ConfigurationError({
								typeName,
								reason: "unknown-type",
								message: `Cannot find the type ${typeName}`,
							}),
						),
					onSome: Effect.succeed,
				}),
			typeNameOf: (value) => this.typeNameOf(value),
		};
	}
}

// ============================================================================
// Layer construction
// ============================================================================

export const makeTypeCatalogLayer = (
	catalog: TypeCatalog,
): Layer.Layer<TypeIntrospector> =>
	Layer.succeed(TypeIntrospector, catalog.toIntrospector());
