import type { FSMKey, HandlerResult } from "./transition-table.ts";

/** Which side of a state change a hook applies to. */
export type Direction = "enter" | "exit";

/**
 * Enter/exit hook. Gets the extended state only; may emit events or throw.
 */
export type HookHandler<TEvent, TContext, TPayload> = (
	context: TContext
) => HandlerResult<TEvent, TPayload>;

export type HookEntry<TEvent, TContext, TPayload> = {
	handler: HookHandler<TEvent, TContext, TPayload>;
	name?: string;
};

export type HookInfo<TState> = {
	state: TState;
	direction: Direction;
	name?: string;
};

/**
 * Mapping of (state, direction) to a hook. Same overwrite semantics as the
 * transition table.
 */
export class EntryExitTable<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext,
	TPayload
> {
	#map = new Map<
		TState,
		Partial<Record<Direction, HookEntry<TEvent, TContext, TPayload>>>
	>();

	#size = 0;

	register(
		state: TState,
		direction: Direction,
		handler: HookHandler<TEvent, TContext, TPayload>,
		name?: string
	): boolean {
		let hooks = this.#map.get(state);
		if (!hooks) {
			hooks = {};
			this.#map.set(state, hooks);
		}
		const isNew = hooks[direction] === undefined;
		hooks[direction] = { handler, name };
		if (isNew) this.#size++;
		return isNew;
	}

	lookup(
		state: TState,
		direction: Direction
	): HookEntry<TEvent, TContext, TPayload> | undefined {
		return this.#map.get(state)?.[direction];
	}

	get size(): number {
		return this.#size;
	}

	*entries(): IterableIterator<HookInfo<TState>> {
		for (const [state, hooks] of this.#map) {
			for (const direction of ["enter", "exit"] as const) {
				const hook = hooks[direction];
				if (!hook) continue;
				yield hook.name === undefined
					? { state, direction }
					: { state, direction, name: hook.name };
			}
		}
	}
}
