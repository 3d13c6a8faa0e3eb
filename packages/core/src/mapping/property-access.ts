import type { PropertyDef, SchemaDefinition } from "../types/schema-types.js";

/**
 * Reads and writes mapped properties on live objects. Private properties
 * are injected as non-enumerable own properties so they stay out of the
 * extra-field scan and out of JSON output.
 */

export const hasField = (object: object, property: PropertyDef): boolean =>
	property.fieldName in object;

export const readField = (object: object, fieldName: string): unknown =>
	Reflect.get(object, fieldName);

export const writeField = (
	object: object,
	fieldName: string,
	value: unknown,
	property?: PropertyDef,
): void => {
	if (property?.visibility === "private") {
		Object.defineProperty(object, fieldName, {
			value,
			writable: true,
			configurable: true,
			enumerable: false,
		});
		return;
	}
	Reflect.set(object, fieldName, value);
};

export const idProperty = (definition: SchemaDefinition): PropertyDef | undefined =>
	definition.propertiesByFieldName.get(definition.idPropertyKey);

export const readId = (definition: SchemaDefinition, object: object): unknown => {
	const property = idProperty(definition);
	return property === undefined ? undefined : readField(object, property.fieldName);
};

export const writeId = (
	definition: SchemaDefinition,
	object: object,
	value: unknown,
): void => {
	const property = idProperty(definition);
	if (property !== undefined) {
		writeField(object, property.fieldName, value, property);
	}
};

/** No identifier assigned yet. */
export const isMissingId = (value: unknown): boolean =>
	value === undefined || value === null || value === "";
