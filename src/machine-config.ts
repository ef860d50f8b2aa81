import type { HookHandler } from "./entry-exit-table.ts";
import type { QueuedEvent } from "./event-queue.ts";
import { Machine, type Logger } from "./machine.ts";
import type { TransitionHandler } from "./transition-table.ts";

/**
 * Transition configuration object. A missing handler does nothing besides
 * moving the machine to `target`.
 */
export type TransitionObj<TState, TEvent, TContext, TPayload> = {
	target: TState;
	handler?: TransitionHandler<TEvent, TContext, TPayload>;
	name?: string;
};

/**
 * Transition definition in a declarative config. Either just the target state
 * (e.g. `"IDLE"`), or a `{ target, handler?, name? }` object.
 */
export type TransitionDef<TState, TEvent, TContext, TPayload> =
	| TState
	| TransitionObj<TState, TEvent, TContext, TPayload>;

/** Hook definition: a function, or a function with a display name. */
export type HookDef<TEvent, TContext, TPayload> =
	| HookHandler<TEvent, TContext, TPayload>
	| { handler: HookHandler<TEvent, TContext, TPayload>; name?: string };

/**
 * Configuration object for a single state.
 * Defines the transitions out of this state and optional enter/exit hooks.
 */
export type MachineStateConfig<
	TState extends string,
	TEvent extends string,
	TContext,
	TPayload
> = {
	onEnter?: HookDef<TEvent, TContext, TPayload>;
	onExit?: HookDef<TEvent, TContext, TPayload>;
	on?: Partial<Record<TEvent, TransitionDef<TState, TEvent, TContext, TPayload>>>;
};

/**
 * Declarative machine configuration, see `createMachine()`.
 *
 * @template TState - Union type of all possible state names
 * @template TEvent - Union type of all possible event names
 * @template TContext - Type of the extended state
 * @template TPayload - Type of the optional event payload
 */
export type MachineConfig<
	TState extends string,
	TEvent extends string,
	TContext,
	TPayload = unknown
> = {
	name: string;
	initial: TState;
	context: TContext | (() => TContext);
	states: Partial<
		Record<TState, MachineStateConfig<TState, TEvent, TContext, TPayload>>
	>;
	debug?: boolean;
	logger?: Logger;
};

/**
 * A partial config for composition. All fields are optional, and states can
 * be partially defined in each fragment.
 */
export type MachineConfigFragment<
	TState extends string,
	TEvent extends string,
	TContext,
	TPayload = unknown
> = {
	name?: string;
	initial?: TState;
	context?: TContext | (() => TContext);
	states?: Partial<
		Record<TState, MachineStateConfig<TState, TEvent, TContext, TPayload>>
	>;
};

/**
 * Options for composing machine configurations.
 */
export type ComposeMachineConfigOptions = {
	/**
	 * How to handle hooks (onEnter, onExit) when multiple fragments
	 * define them for the same state.
	 *
	 * - 'replace': Later fragments override earlier ones (default)
	 * - 'compose': Chain hooks - all hooks run in fragment order, their
	 *   emitted events are concatenated, the first throw stops the chain
	 */
	hooks?: "replace" | "compose";

	/**
	 * How to handle context when multiple fragments define it.
	 *
	 * - 'merge': Shallow-merge context objects from all fragments (default)
	 * - 'replace': Later fragments completely override earlier context
	 */
	context?: "merge" | "replace";

	/**
	 * How to handle conflicts for singular values (`initial`, `name`).
	 *
	 * - 'last-wins': Later fragments override earlier ones (default)
	 * - 'error': Throw an error if fragments define different values
	 */
	onConflict?: "last-wins" | "error";
};

const noop = (): void => {};

function isTransitionObj<TState, TEvent, TContext, TPayload>(
	def: TransitionDef<TState, TEvent, TContext, TPayload>
): def is TransitionObj<TState, TEvent, TContext, TPayload> {
	return typeof def === "object" && def !== null;
}

function normalizeHook<TEvent, TContext, TPayload>(
	def: HookDef<TEvent, TContext, TPayload>
): { handler: HookHandler<TEvent, TContext, TPayload>; name?: string } {
	return typeof def === "function" ? { handler: def } : def;
}

/**
 * Creates a machine from a declarative config and registers every transition
 * and hook it defines.
 *
 * @example
 * ```typescript
 * const m = createMachine<"IDLE" | "RUNNING", "start" | "stop", { runs: number }>({
 *   name: "runner",
 *   initial: "IDLE",
 *   context: { runs: 0 },
 *   states: {
 *     IDLE: { on: { start: "RUNNING" } },
 *     RUNNING: {
 *       onEnter: (ctx) => { ctx.runs++; },
 *       on: { stop: "IDLE" },
 *     },
 *   },
 * });
 * ```
 */
export function createMachine<
	TState extends string,
	TEvent extends string,
	TContext,
	TPayload = unknown
>(
	config: MachineConfig<TState, TEvent, TContext, TPayload>
): Machine<TState, TEvent, TContext, TPayload> {
	const machine = new Machine<TState, TEvent, TContext, TPayload>({
		name: config.name,
		initial: config.initial,
		context: config.context,
		debug: config.debug,
		logger: config.logger,
	});

	for (const [state, stateConfig] of stateEntries(config.states)) {
		if (stateConfig.onEnter) {
			const { handler, name } = normalizeHook(stateConfig.onEnter);
			machine.registerEntryHook(state, handler, name);
		}
		if (stateConfig.onExit) {
			const { handler, name } = normalizeHook(stateConfig.onExit);
			machine.registerExitHook(state, handler, name);
		}
		if (!stateConfig.on) continue;
		for (const [event, def] of transitionEntries(stateConfig.on)) {
			if (isTransitionObj(def)) {
				machine.registerTransition(
					state,
					event,
					def.target,
					def.handler ?? noop,
					def.name
				);
			} else {
				machine.registerTransition(state, event, def, noop);
			}
		}
	}

	return machine;
}

/**
 * Composes multiple config fragments into a single config.
 *
 * Transitions of the same state are merged; a later fragment defining the
 * same (state, event) pair replaces the earlier definition.
 *
 * @param fragments - Array of config fragments (falsy values are filtered out)
 * @param options - Composition options
 * @returns A merged machine configuration
 *
 * @example
 * ```typescript
 * const config = composeMachineConfig([core, featureEnabled && feature]);
 * const machine = createMachine(config);
 * ```
 */
export function composeMachineConfig<
	TState extends string,
	TEvent extends string,
	TContext,
	TPayload = unknown
>(
	fragments: (
		| MachineConfigFragment<TState, TEvent, TContext, TPayload>
		| false
		| null
		| undefined
	)[],
	options: ComposeMachineConfigOptions = {}
): MachineConfig<TState, TEvent, TContext, TPayload> {
	const {
		hooks = "replace",
		context: contextMode = "merge",
		onConflict = "last-wins",
	} = options;

	// Filter out falsy values (allows conditional fragments)
	const validFragments = fragments.filter(
		(f): f is MachineConfigFragment<TState, TEvent, TContext, TPayload> =>
			Boolean(f)
	);

	if (validFragments.length === 0) {
		throw new Error("composeMachineConfig requires at least one valid fragment");
	}

	let initial: TState | undefined;
	let name: string | undefined;
	const contextSources: (TContext | (() => TContext))[] = [];

	const mergedStates: Partial<
		Record<TState, MachineStateConfig<TState, TEvent, TContext, TPayload>>
	> = {};

	const hookCollectors = new Map<
		TState,
		{
			onEnter: HookDef<TEvent, TContext, TPayload>[];
			onExit: HookDef<TEvent, TContext, TPayload>[];
		}
	>();

	const pick = <T>(label: string, prev: T | undefined, next: T | undefined) => {
		if (next === undefined) return prev;
		if (onConflict === "error" && prev !== undefined && prev !== next) {
			throw new Error(
				`Conflict: multiple fragments define different '${label}' values: "${prev}" vs "${next}"`
			);
		}
		return next;
	};

	for (const fragment of validFragments) {
		initial = pick("initial", initial, fragment.initial);
		name = pick("name", name, fragment.name);

		if (fragment.context !== undefined) {
			contextSources.push(fragment.context);
		}

		for (const [state, config] of stateEntries(fragment.states ?? {})) {
			const merged: MachineStateConfig<TState, TEvent, TContext, TPayload> = mergedStates[state] ?? { on: {} };
			mergedStates[state] = merged;

			if (config.on) {
				merged.on = { ...merged.on, ...config.on };
			}

			if (hooks === "compose") {
				const collector = hookCollectors.get(state) ?? { onEnter: [], onExit: [] };
				hookCollectors.set(state, collector);
				if (config.onEnter) collector.onEnter.push(config.onEnter);
				if (config.onExit) collector.onExit.push(config.onExit);
			} else {
				if (config.onEnter) merged.onEnter = config.onEnter;
				if (config.onExit) merged.onExit = config.onExit;
			}
		}
	}

	// In compose mode, create composed hook functions
	for (const [state, collectors] of hookCollectors) {
		const merged = mergedStates[state];
		if (!merged) continue;
		if (collectors.onEnter.length > 0) {
			merged.onEnter = composeHooks(collectors.onEnter);
		}
		if (collectors.onExit.length > 0) {
			merged.onExit = composeHooks(collectors.onExit);
		}
	}

	if (initial === undefined) {
		throw new Error("composeMachineConfig: no 'initial' state defined in any fragment");
	}

	const result: MachineConfig<TState, TEvent, TContext, TPayload> = {
		name: name ?? "fsm",
		initial,
		context: mergeContext(contextSources, contextMode),
		states: mergedStates,
	};

	return result;
}

function mergeContext<TContext>(
	sources: (TContext | (() => TContext))[],
	mode: "merge" | "replace"
): () => TContext {
	const resolve = (source: TContext | (() => TContext)): TContext =>
		typeof source === "function" ? (source as () => TContext)() : source;

	if (mode === "replace") {
		const last = sources[sources.length - 1];
		return () => (last === undefined ? ({} as TContext) : resolve(last));
	}

	// merge mode (default): factory that shallow-merges all contexts
	return () => {
		let merged = {} as TContext;
		for (const source of sources) {
			merged = { ...merged, ...resolve(source) };
		}
		return merged;
	};
}

/**
 * Creates a single named hook that runs multiple hooks in sequence and
 * concatenates the events they emit.
 */
function composeHooks<TEvent, TContext, TPayload>(
	defs: HookDef<TEvent, TContext, TPayload>[]
): HookDef<TEvent, TContext, TPayload> {
	const normalized = defs.map((d) => normalizeHook(d));
	const names = normalized.map((d) => d.name).filter((n) => n !== undefined);
	return {
		handler: (context: TContext) => {
			const emitted: QueuedEvent<TEvent, TPayload>[] = [];
			for (const { handler } of normalized) {
				const events = handler(context);
				if (events) emitted.push(...events);
			}
			return emitted;
		},
		name: names.length ? names.join("+") : undefined,
	};
}

// Object.entries loses the key types, these restore them
function stateEntries<K extends string, V>(
	record: Partial<Record<K, V>>
): [K, V][] {
	const out: [K, V][] = [];
	for (const key of Object.keys(record)) {
		const value = record[key as K];
		if (value !== undefined) out.push([key as K, value]);
	}
	return out;
}

const transitionEntries = stateEntries;
