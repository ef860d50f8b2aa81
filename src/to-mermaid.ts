import type { MachineSnapshot } from "./machine.ts";
import type { DiagramLabels } from "./to-dot.ts";

/**
 * Generates a Mermaid stateDiagram-v2 notation from a machine snapshot.
 *
 * Transitions are labeled `event` or `event / name` when the transition has a
 * name; enter/exit hooks are rendered as notes next to their state.
 *
 * @example
 * ```typescript
 * console.log(toMermaid(machine.snapshot()));
 * // stateDiagram-v2
 * //     [*] --> IDLE
 * //     IDLE --> LOADING: load / startFetch
 * ```
 */
export function toMermaid<TState, TEvent>(
	snapshot: MachineSnapshot<TState, TEvent>,
	labels: DiagramLabels<TState, TEvent> = {}
): string {
	const stateLabel = (s: TState) => labels.stateLabels?.get(s) ?? String(s);
	const eventLabel = (e: TEvent) => labels.eventLabels?.get(e) ?? String(e);

	let mermaid = "stateDiagram-v2\n";
	mermaid += `    [*] --> ${stateLabel(snapshot.initial)}\n`;

	for (const t of snapshot.transitions) {
		let label = eventLabel(t.event);
		if (t.name) label += ` / ${t.name}`;
		mermaid += `    ${stateLabel(t.state)} --> ${stateLabel(t.target)}: ${label}\n`;
	}

	for (const h of snapshot.hooks) {
		const note = h.name ? `${h.direction} / ${h.name}` : h.direction;
		mermaid += `    note right of ${stateLabel(h.state)}: ${note}\n`;
	}

	return mermaid;
}
