/**
 * Lifecycle event dispatch.
 *
 * Type-declared hooks run first, in declaration order, with the arguments
 * captured from their annotation. Observers follow in registration order;
 * each observer method named after one of the event's aliases is called with
 * the object. A throwing hook or observer aborts the rest of the dispatch.
 */

import { Effect } from "effect";
import { ConfigurationError, HookError } from "../errors/mapping-errors.js";
import { TypeIntrospector } from "../introspection/type-introspector.js";
import { EVENT_ALIASES } from "../metadata/event-aliases.js";
import type { EventKind, Observer, SchemaDefinition } from "../types/schema-types.js";

const errorMessage = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);

const invoke = (
	definition: SchemaDefinition,
	kind: EventKind,
	target: object,
	method: string,
	args: ReadonlyArray<unknown>,
): Effect.Effect<void, HookError> =>
	Effect.try({
		try: () => {
			const fn: unknown = Reflect.get(target, method);
			if (typeof fn === "function") {
				Reflect.apply(fn, target, args);
			}
		},
		catch: (cause) =>
			new HookError({
				event: kind,
				method,
				typeName: definition.typeName,
				reason: "hook-failed",
				message: `${kind} hook ${definition.typeName}.${method} failed: ${errorMessage(cause)}`,
				cause,
			}),
	});

export const triggerEvent = (
	definition: SchemaDefinition,
	object: object,
	kind: EventKind,
): Effect.Effect<void, ConfigurationError | HookError> =>
	Effect.gen(function* () {
		for (const hook of definition.events.get(kind) ?? []) {
			if (hook.visibility !== "public") {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName: definition.typeName,
						reason: "non-public-hook",
						message: `Event hook ${definition.typeName}.${hook.method} must be public`,
					}),
				);
			}
			if (typeof Reflect.get(object, hook.method) !== "function") {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName: definition.typeName,
						reason: "missing-hook",
						message: `Event hook ${definition.typeName}.${hook.method} is not a method`,
					}),
				);
			}
			yield* invoke(definition, kind, object, hook.method, hook.args);
		}

		// Observers registered during dispatch only see later events.
		for (const observer of [...definition.observers]) {
			for (const alias of EVENT_ALIASES[kind]) {
				yield* invoke(definition, kind, observer, alias, [object]);
			}
		}
	});

/**
 * Adds an observer. A type name is resolved through the introspector and
 * constructed with no arguments.
 */
export const registerObserver = (
	definition: SchemaDefinition,
	observer: Observer | string,
): Effect.Effect<Observer, ConfigurationError, TypeIntrospector> =>
	Effect.gen(function* () {
		if (typeof observer !== "string") {
			definition.observers.push(observer);
			return observer;
		}

		const introspector = yield* TypeIntrospector;
		const description = yield* introspector.describe(observer).pipe(
			Effect.mapError(
				() =>
					new ConfigurationError({
						typeName: observer,
						reason: "unknown-observer",
						message: `Cannot find the observer type ${observer}`,
					}),
			),
		);
		const instance = yield* Effect.try({
			try: () => description.construct(),
			catch: (cause) =>
				new ConfigurationError({
					typeName: observer,
					reason: "unknown-observer",
					message: `Cannot construct the observer ${observer}: ${errorMessage(cause)}`,
				}),
		});
		definition.observers.push(instance);
		return instance;
	});
