import { Context, type Effect, type Stream } from "effect";
import type { TransportError } from "../errors/transport-errors.js";
import type {
	CommandResult,
	Selector,
	StoredDocument,
	TransportCommand,
} from "../types/document-types.js";

// ============================================================================
// DocumentTransport Effect Service
// ============================================================================

export interface DocumentTransportShape {
	readonly execute: (
		command: TransportCommand,
	) => Effect.Effect<CommandResult, TransportError>;
	readonly find: (
		collection: string,
		selector: Selector,
	) => Stream.Stream<StoredDocument, TransportError>;
}

export class DocumentTransport extends Context.Tag("DocumentTransport")<
	DocumentTransport,
	DocumentTransportShape
>() {}
