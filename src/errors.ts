/**
 * Base class of every error the engine raises while processing events.
 * Any of them means the machine must be shut down by its owner.
 */
export abstract class FSMError extends Error {
	abstract readonly kind: "NoTransition" | "InternalError" | "TransitionFailure";
}

/**
 * No transition is registered for the event in the current state.
 * Signals a protocol or programming error on the caller's side.
 */
export class NoTransitionError<TEvent = unknown, TState = unknown> extends FSMError {
	readonly kind = "NoTransition";

	constructor(
		public readonly event: TEvent,
		public readonly state: TState
	) {
		super(
			`No transition for event "${String(event)}" in state "${String(state)}"`
		);
		this.name = "NoTransitionError";
	}
}

/**
 * A transition handler or an enter/exit hook failed with an
 * application-specific error, kept as `cause`.
 */
export class InternalError<
	TEvent = unknown,
	TState = unknown,
	TCause = unknown
> extends FSMError {
	readonly kind = "InternalError";

	constructor(
		public readonly event: TEvent,
		public readonly state: TState,
		public readonly cause: TCause
	) {
		super(
			`Handler failed on event "${String(event)}" in state "${String(state)}": ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			{ cause }
		);
		this.name = "InternalError";
	}
}

/** Generic fatal failure not otherwise categorized. */
export class TransitionFailure extends FSMError {
	readonly kind = "TransitionFailure";

	constructor(message = "Transition failed") {
		super(message);
		this.name = "TransitionFailure";
	}
}

/** Any error `Machine.process()` may raise. */
export type EngineError<TEvent = unknown, TState = unknown> =
	| NoTransitionError<TEvent, TState>
	| InternalError<TEvent, TState>
	| TransitionFailure;

/**
 * Normalizes a value thrown from a handler or hook. Engine errors pass through
 * unchanged, anything else is wrapped as an `InternalError`.
 */
export function toEngineError(
	thrown: unknown,
	event: unknown,
	state: unknown
): EngineError {
	if (
		thrown instanceof NoTransitionError ||
		thrown instanceof InternalError ||
		thrown instanceof TransitionFailure
	) {
		return thrown;
	}
	return new InternalError(event, state, thrown);
}
