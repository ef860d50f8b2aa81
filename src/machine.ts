import { createPubSub } from "@marianmeres/pubsub";
import {
	EntryExitTable,
	type Direction,
	type HookHandler,
	type HookInfo,
} from "./entry-exit-table.ts";
import {
	TransitionFailure,
	NoTransitionError,
	toEngineError,
	type EngineError,
} from "./errors.ts";
import { EventQueue, type QueuedEvent } from "./event-queue.ts";
import {
	TransitionTable,
	type FSMKey,
	type HandlerResult,
	type TransitionHandler,
	type TransitionInfo,
} from "./transition-table.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/**
 * Copies plain objects (so the caller keeps no handle on the extended state),
 * everything else is returned as is.
 */
function shallowCopy<T>(value: T): T {
	if (value === null || typeof value !== "object") return value;
	const proto = Object.getPrototypeOf(value);
	if (proto !== Object.prototype && proto !== null) return value;
	return { ...value };
}

/**
 * Constructor options.
 *
 * @template TState - Type of state identifiers (usually a string union or enum)
 * @template TContext - Type of the extended state
 */
export type MachineOptions<TState, TContext> = {
	/** Machine name, used in logs and diagrams */
	name: string;
	initial: TState;
	/**
	 * Initial extended state. A function is treated as a factory and called
	 * once; wrap function-valued contexts in a factory. A plain object value
	 * is copied shallowly.
	 */
	context: TContext | (() => TContext);
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/** Outcome of `tryProcess()`. */
export type ProcessResult =
	| { ok: true; processed: number }
	| { ok: false; error: EngineError };

/** Data sent to `subscribe()` callbacks. */
export type PublishedState<TState, TContext> = {
	current: TState;
	previous: TState | null;
	context: Readonly<TContext>;
};

/**
 * Read-only description of a machine's tables, consumed by the diagram
 * exporters.
 */
export type MachineSnapshot<TState, TEvent> = {
	name: string;
	initial: TState;
	current: TState;
	transitions: TransitionInfo<TState, TEvent>[];
	hooks: HookInfo<TState>[];
};

/**
 * Generic finite state machine with extended state and an event queue.
 *
 * Transitions are registered per (state, event) pair and always lead to the
 * registered target. Handlers and enter/exit hooks get exclusive mutable access
 * to the extended state and may emit further events, which are queued and run
 * by a later `process()` call.
 *
 * Execution order of one external transition (target differs from current):
 * 1. exit hook of the current state
 * 2. transition handler
 * 3. state changes
 * 4. enter hook of the target state
 * 5. subscribers notified
 *
 * Self-transitions run only the handler (and notify).
 *
 * Any error is fatal: the rest of the wave is dropped, nothing is rolled back,
 * and the owner is expected to shut the machine down.
 *
 * @template TState - Type of state identifiers
 * @template TEvent - Type of event identifiers
 * @template TContext - Type of the extended state
 * @template TPayload - Type of the optional per-event payload
 *
 * @example
 * ```typescript
 * const m = new Machine<"OFF" | "ON", "toggle", { flips: number }>({
 *   name: "switch",
 *   initial: "OFF",
 *   context: { flips: 0 },
 * });
 * m.registerTransition("OFF", "toggle", "ON", (ctx) => { ctx.flips++; });
 * m.enqueue([{ event: "toggle" }]);
 * m.process(); // 1
 * m.state; // "ON"
 * ```
 */
export class Machine<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext,
	TPayload = unknown
> {
	readonly #name: string;

	readonly #initial: TState;

	#state: TState;

	#previous: TState | null = null;

	/** The extended state, owned by the machine for its whole lifetime */
	#context: TContext;

	#queue = new EventQueue<TEvent, TPayload>();

	#transitions = new TransitionTable<TState, TEvent, TContext, TPayload>();

	#hooks = new EntryExitTable<TState, TEvent, TContext, TPayload>();

	/** Re-entrancy guard, set while a wave is running */
	#processing = false;

	#pubsub = createPubSub();

	#logger: Logger;

	#debug: boolean;

	constructor(options: MachineOptions<TState, TContext>) {
		this.#name = options.name;
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
		this.#initial = options.initial;
		this.#state = options.initial;
		this.#context =
			typeof options.context === "function"
				? (options.context as () => TContext)()
				: shallowCopy(options.context);
		this.#debugLog(`created with initial state "${String(this.#state)}"`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[FSM]", `${this.#name}:`, ...args);
		}
	}

	/**
	 * Returns the machine name given at construction.
	 * @returns The name used in logs and diagrams
	 */
	get name(): string {
		return this.#name;
	}

	/**
	 * Returns whether debug mode is enabled.
	 * @returns `true` if debug logging is active, `false` otherwise
	 */
	get debug(): boolean {
		return this.#debug;
	}

	/**
	 * Returns the logger instance used by this machine.
	 * @returns The Logger instance (default: console)
	 */
	get logger(): Logger {
		return this.#logger;
	}

	/** Current state. Changes only as a result of a successful handler. */
	get state(): TState {
		return this.#state;
	}

	/** State before the last executed transition, `null` if none yet. */
	get previous(): TState | null {
		return this.#previous;
	}

	/**
	 * Read-only view of the extended state. Only valid between processing
	 * calls; reading it from inside a handler or hook throws.
	 */
	get extendedState(): Readonly<TContext> {
		this.#assertIdle("extendedState");
		return this.#context;
	}

	/** `true` iff events are waiting to be processed. */
	get pending(): boolean {
		return this.#queue.pending;
	}

	/**
	 * Checks whether the machine is currently in the given state.
	 *
	 * @param state - The state to check against
	 * @returns True if the machine is in the specified state
	 *
	 * @example
	 * ```typescript
	 * if (still.is("Open")) {
	 *   showDoor();
	 * }
	 * ```
	 */
	is(state: TState): boolean {
		return this.#state === state;
	}

	/**
	 * Whether a transition is registered for `event` in the current state.
	 * Does not run anything.
	 */
	canProcess(event: TEvent): boolean {
		return this.#transitions.has(this.#state, event);
	}

	/**
	 * Registers the transition `state --event--> target`.
	 *
	 * @returns `true` if the pair was new, `false` if an earlier registration
	 * was overwritten (treat as a configuration warning)
	 */
	registerTransition(
		state: TState,
		event: TEvent,
		target: TState,
		handler: TransitionHandler<TEvent, TContext, TPayload>,
		name?: string
	): boolean {
		const isNew = this.#transitions.register(state, event, target, handler, name);
		this.#debugLog(
			`registerTransition("${String(state)}", "${String(event)}") -> "${String(target)}"`,
			isNew ? "" : "(overwritten)"
		);
		return isNew;
	}

	/** Registers a hook fired right after a transition moves into `state`. */
	registerEntryHook(
		state: TState,
		handler: HookHandler<TEvent, TContext, TPayload>,
		name?: string
	): boolean {
		return this.#registerHook(state, "enter", handler, name);
	}

	/** Registers a hook fired right before a transition moves out of `state`. */
	registerExitHook(
		state: TState,
		handler: HookHandler<TEvent, TContext, TPayload>,
		name?: string
	): boolean {
		return this.#registerHook(state, "exit", handler, name);
	}

	#registerHook(
		state: TState,
		direction: Direction,
		handler: HookHandler<TEvent, TContext, TPayload>,
		name?: string
	): boolean {
		const isNew = this.#hooks.register(state, direction, handler, name);
		this.#debugLog(
			`register ${direction} hook for "${String(state)}"`,
			isNew ? "" : "(overwritten)"
		);
		return isNew;
	}

	/**
	 * Appends events to the back of the queue. Never processes them.
	 * @returns Number of events enqueued
	 */
	enqueue(events: Iterable<QueuedEvent<TEvent, TPayload>>): number {
		const count = this.#queue.push(events);
		this.#debugLog(`enqueue() added ${count} event(s)`);
		return count;
	}

	/**
	 * Processes one wave: every event queued at the time of the call, in order.
	 * Events emitted by handlers and hooks during the wave are queued for the
	 * next call; keep calling while `pending` is true (or use `run()`).
	 *
	 * On the first failure the remaining events of the wave are discarded (not
	 * requeued) and the error is thrown. Steps already completed are kept.
	 *
	 * @returns Number of events captured into the wave
	 * @throws NoTransitionError, InternalError or TransitionFailure
	 */
	process(): number {
		this.#assertIdle("process()");
		const wave = this.#queue.drain();
		this.#debugLog(`process() wave of ${wave.length} event(s)`);

		this.#processing = true;
		try {
			for (const item of wave) {
				this.#step(item);
			}
		} catch (e) {
			this.#debugLog("process() wave aborted:", e);
			throw e;
		} finally {
			this.#processing = false;
		}

		return wave.length;
	}

	/** Same as `process()`, but reports engine errors as a value. */
	tryProcess(): ProcessResult {
		this.#assertIdle("tryProcess()");
		try {
			return { ok: true, processed: this.process() };
		} catch (e) {
			return { ok: false, error: toEngineError(e, undefined, this.#state) };
		}
	}

	/**
	 * Calls `process()` until no events remain.
	 *
	 * @param maxWaves - Upper bound on waves, guards against endless cascades
	 * @returns Total number of events processed
	 * @throws TransitionFailure if events are still pending after `maxWaves`
	 */
	run(maxWaves = 1000): number {
		let total = 0;
		let waves = 0;
		while (this.#queue.pending) {
			if (waves >= maxWaves) {
				throw new TransitionFailure(
					`Events still pending after ${maxWaves} waves in "${this.#name}"`
				);
			}
			total += this.process();
			waves++;
		}
		return total;
	}

	#step({ event, payload }: QueuedEvent<TEvent, TPayload>): void {
		const state = this.#state;
		this.#debugLog(`processing "${String(event)}" in "${String(state)}"`);

		const entry = this.#transitions.lookup(state, event);
		if (!entry) {
			throw new NoTransitionError(event, state);
		}

		const { target } = entry;
		const changesState = target !== state;

		// 1. exit current state
		if (changesState) this.#runHook(state, "exit", event);

		// 2. transition handler
		this.#collect(
			this.#invoke(() => entry.handler(this.#context, event, payload), event, state)
		);

		// 3. the destination comes from the table, not from the handler
		this.#previous = state;
		this.#state = target;
		this.#debugLog(`"${String(state)}" -> "${String(target)}"`);

		// 4. enter new state, 5. notify (even if enter failed, state did change)
		try {
			if (changesState) this.#runHook(target, "enter", event);
		} finally {
			this.#notify();
		}
	}

	#runHook(state: TState, direction: Direction, event: TEvent): void {
		const hook = this.#hooks.lookup(state, direction);
		if (!hook) return;
		this.#debugLog(
			`${direction} hook for "${String(state)}"`,
			hook.name ? `(${hook.name})` : ""
		);
		this.#collect(this.#invoke(() => hook.handler(this.#context), event, state));
	}

	#invoke(
		fn: () => HandlerResult<TEvent, TPayload>,
		event: TEvent,
		state: TState
	): HandlerResult<TEvent, TPayload> {
		try {
			return fn();
		} catch (e) {
			throw toEngineError(e, event, state);
		}
	}

	#collect(result: HandlerResult<TEvent, TPayload>): void {
		if (result && result.length) {
			const count = this.#queue.push(result);
			this.#debugLog(`queued ${count} emitted event(s) for the next wave`);
		}
	}

	#assertIdle(what: string): void {
		if (this.#processing) {
			throw new TransitionFailure(
				`${what} is not available while "${this.#name}" is processing`
			);
		}
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	#getNotifyData(): PublishedState<TState, TContext> {
		return {
			current: this.#state,
			previous: this.#previous,
			context: this.#context,
		};
	}

	/**
	 * Subscribes to executed transitions. The callback is invoked immediately
	 * with the current data and then after every transition step (self
	 * transitions included). Purely observational.
	 *
	 * @returns Unsubscriber function
	 */
	subscribe(cb: (data: PublishedState<TState, TContext>) => void): () => void {
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	/** Read-only description of the tables for diagram exporters. */
	snapshot(): MachineSnapshot<TState, TEvent> {
		return {
			name: this.#name,
			initial: this.#initial,
			current: this.#state,
			transitions: [...this.#transitions.entries()],
			hooks: [...this.#hooks.entries()],
		};
	}
}
