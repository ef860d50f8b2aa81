import { writeFile } from "node:fs/promises";
import type { MachineSnapshot } from "./machine.ts";

/** Human-readable names for states and events. Missing ones use `String()`. */
export type DiagramLabels<TState, TEvent> = {
	stateLabels?: ReadonlyMap<TState, string>;
	eventLabels?: ReadonlyMap<TEvent, string>;
};

export type WriteDotOptions<TState, TEvent> = DiagramLabels<TState, TEvent> & {
	/** Destination file; stdout if omitted */
	outfile?: string;
};

/**
 * States in diagram order: labeled states first, then the initial state, then
 * anything else referenced by a transition or a hook.
 */
export function collectStates<TState, TEvent>(
	snapshot: MachineSnapshot<TState, TEvent>,
	stateLabels?: ReadonlyMap<TState, string>
): TState[] {
	const states = new Set<TState>(stateLabels?.keys() ?? []);
	states.add(snapshot.initial);
	for (const t of snapshot.transitions) {
		states.add(t.state);
		states.add(t.target);
	}
	for (const h of snapshot.hooks) states.add(h.state);
	return [...states];
}

const escape = (s: string) =>
	s.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");

/**
 * Renders a Graphviz `digraph` of the machine.
 *
 * - one node per state, the initial one as a diamond
 * - a dashed "shadow" node per enter/exit hook, `Enter -> state` and
 *   `state -> Exit`, labeled with the hook name
 * - one edge per transition, labeled `"<name>\n|<event>|"`
 *
 * @example
 * ```typescript
 * console.log(toDot(machine.snapshot()));
 * // digraph G_switch {
 * //     N0[label="OFF"][shape="diamond"];
 * //     N1[label="ON"][shape="oval"];
 * //     N0 -> N1[label="\n|toggle|"];
 * // }
 * ```
 */
export function toDot<TState, TEvent>(
	snapshot: MachineSnapshot<TState, TEvent>,
	labels: DiagramLabels<TState, TEvent> = {}
): string {
	const { stateLabels, eventLabels } = labels;
	const ids = new Map<TState, string>();
	const stateLabel = (s: TState) => stateLabels?.get(s) ?? String(s);
	const eventLabel = (e: TEvent) => eventLabels?.get(e) ?? String(e);

	let dot = `digraph G_${snapshot.name.replace(/\W/g, "_")} {\n`;

	collectStates(snapshot, stateLabels).forEach((state, idx) => {
		const id = `N${idx}`;
		ids.set(state, id);
		const shape = state === snapshot.initial ? "diamond" : "oval";
		dot += `    ${id}[label="${escape(stateLabel(state))}"][shape="${shape}"];\n`;
	});

	for (const { state, direction } of snapshot.hooks) {
		const label = direction === "enter" ? "Enter" : "Exit";
		dot += `    ${ids.get(state)}_${direction}[label="${label}"][shape="plain"][style="dashed"];\n`;
	}

	for (const t of snapshot.transitions) {
		const label = `${escape(t.name ?? "")}\\n|${escape(eventLabel(t.event))}|`;
		dot += `    ${ids.get(t.state)} -> ${ids.get(t.target)}[label="${label}"];\n`;
	}

	for (const { state, direction, name } of snapshot.hooks) {
		const id = ids.get(state);
		const [from, to] =
			direction === "enter" ? [`${id}_enter`, id] : [id, `${id}_exit`];
		dot += `    ${from} -> ${to}[label="${escape(name ?? "")}"];\n`;
	}

	return dot + "}\n";
}

/**
 * Writes `toDot()` output to `outfile`, or to stdout when none is given.
 * Filesystem errors are passed to the caller as is.
 */
export async function writeDot<TState, TEvent>(
	snapshot: MachineSnapshot<TState, TEvent>,
	options: WriteDotOptions<TState, TEvent> = {}
): Promise<void> {
	const dot = toDot(snapshot, options);
	if (options.outfile) {
		await writeFile(options.outfile, dot, "utf8");
	} else {
		process.stdout.write(dot);
	}
}
