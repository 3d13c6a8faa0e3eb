import {
	type Annotation,
	type AnnotationArg,
	isAnnotation,
} from "../types/annotation-types.js";
import { TypeDescriptor } from "../types/schema-types.js";

const TYPE_ANNOTATIONS = new Set([
	"int",
	"integer",
	"float",
	"double",
	"array",
	"bool",
	"boolean",
	"string",
	"object",
	"class",
	"type",
	"id",
]);

const describeNamed = (
	name: string,
	first: AnnotationArg | undefined,
	className: AnnotationArg | undefined,
): TypeDescriptor => {
	switch (name.toLowerCase()) {
		case "id":
			return TypeDescriptor.id;
		case "int":
		case "integer":
			return TypeDescriptor.scalar("int");
		case "float":
		case "double":
			return TypeDescriptor.scalar("float");
		case "bool":
		case "boolean":
			return TypeDescriptor.scalar("bool");
		case "string":
			return TypeDescriptor.scalar("string");
		case "object":
			return TypeDescriptor.scalar("object");
		case "class":
			return typeof className === "string"
				? TypeDescriptor.classType(className)
				: TypeDescriptor.scalar("object");
		case "array":
			return TypeDescriptor.array(
				isAnnotation(first) ? descriptorFromAnnotation(first) : TypeDescriptor.untyped,
			);
		default:
			return TypeDescriptor.untyped;
	}
};

export const descriptorFromAnnotation = (annotation: Annotation): TypeDescriptor => {
	if (annotation.name.toLowerCase() === "type") {
		const declared = annotation.options.type ?? annotation.args[0];
		if (typeof declared !== "string") {
			return TypeDescriptor.untyped;
		}
		return describeNamed(declared, annotation.options.element, annotation.options.class);
	}
	return describeNamed(annotation.name, annotation.args[0], annotation.args[0]);
};

/**
 * The declared value type of a property: its first type annotation, or
 * Untyped when it has none.
 */
export const descriptorOf = (annotations: ReadonlyArray<Annotation>): TypeDescriptor => {
	const annotation = annotations.find((candidate) =>
		TYPE_ANNOTATIONS.has(candidate.name.toLowerCase()),
	);
	return annotation ? descriptorFromAnnotation(annotation) : TypeDescriptor.untyped;
};
