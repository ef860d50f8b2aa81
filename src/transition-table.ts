import type { QueuedEvent } from "./event-queue.ts";

/**
 * Events a handler or hook asks the machine to enqueue. Returning nothing is
 * the same as returning an empty list.
 */
export type HandlerResult<TEvent, TPayload> =
	| QueuedEvent<TEvent, TPayload>[]
	| void;

/**
 * Transition handler. Receives exclusive mutable access to the extended state
 * together with the event and its payload. Throw to fail the transition.
 */
export type TransitionHandler<TEvent, TContext, TPayload> = (
	context: TContext,
	event: TEvent,
	payload: TPayload | undefined
) => HandlerResult<TEvent, TPayload>;

/**
 * Allowed state and event identifiers. Tables compare them by value, which
 * holds for primitives only.
 */
export type FSMKey = string | number | symbol | boolean | bigint;

/** Value side of the transition table. */
export type TransitionEntry<TState, TEvent, TContext, TPayload> = {
	target: TState;
	handler: TransitionHandler<TEvent, TContext, TPayload>;
	name?: string;
};

/** Handler-free view of a registered transition. */
export type TransitionInfo<TState, TEvent> = {
	state: TState;
	event: TEvent;
	target: TState;
	name?: string;
};

/**
 * Mapping of (state, event) to (target, handler, name). At most one entry per
 * pair; registering over an existing pair replaces it.
 */
export class TransitionTable<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext,
	TPayload
> {
	#map = new Map<
		TState,
		Map<TEvent, TransitionEntry<TState, TEvent, TContext, TPayload>>
	>();

	#size = 0;

	/**
	 * @returns `true` if the slot was empty, `false` if an existing entry was
	 * overwritten
	 */
	register(
		state: TState,
		event: TEvent,
		target: TState,
		handler: TransitionHandler<TEvent, TContext, TPayload>,
		name?: string
	): boolean {
		let byEvent = this.#map.get(state);
		if (!byEvent) {
			byEvent = new Map();
			this.#map.set(state, byEvent);
		}
		const isNew = !byEvent.has(event);
		// delete first so that iteration order reflects the latest registration
		byEvent.delete(event);
		byEvent.set(event, { target, handler, name });
		if (isNew) this.#size++;
		return isNew;
	}

	lookup(
		state: TState,
		event: TEvent
	): TransitionEntry<TState, TEvent, TContext, TPayload> | undefined {
		return this.#map.get(state)?.get(event);
	}

	has(state: TState, event: TEvent): boolean {
		return this.#map.get(state)?.has(event) ?? false;
	}

	get size(): number {
		return this.#size;
	}

	*entries(): IterableIterator<TransitionInfo<TState, TEvent>> {
		for (const [state, byEvent] of this.#map) {
			for (const [event, { target, name }] of byEvent) {
				yield name === undefined
					? { state, event, target }
					: { state, event, target, name };
			}
		}
	}
}
