import { Data } from "effect";

/**
 * Failure reported by a DocumentTransport. The mapping engine never retries
 * and never inspects it; it reaches the caller unchanged.
 */
export class TransportError extends Data.TaggedError("TransportError")<{
	readonly command: string;
	readonly reason: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}
