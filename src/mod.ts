/**
 * @module
 *
 * A generic, embeddable finite state machine engine with extended state.
 *
 * Transitions are registered per (state, event) pair, states may have enter
 * and exit hooks, and events are processed from a queue in waves: events
 * emitted by handlers during one `process()` call run in the next one.
 *
 * @example Basic usage
 * ```typescript
 * import { Machine } from "extended-fsm";
 *
 * const m = new Machine<"IDLE" | "BUSY", "start" | "done", { jobs: number }>({
 *   name: "worker",
 *   initial: "IDLE",
 *   context: { jobs: 0 },
 * });
 * m.registerTransition("IDLE", "start", "BUSY", (ctx) => {
 *   ctx.jobs++;
 *   return [{ event: "done" }];
 * });
 * m.registerTransition("BUSY", "done", "IDLE", () => {});
 *
 * m.enqueue([{ event: "start" }]);
 * m.process(); // -> BUSY, "done" is now pending
 * m.process(); // -> IDLE
 * ```
 *
 * @example Declarative config and diagrams
 * ```typescript
 * import { createMachine, toDot, toMermaid } from "extended-fsm";
 *
 * const m = createMachine(config);
 * console.log(toMermaid(m.snapshot()));
 * ```
 */

export * from "./errors.ts";
export * from "./event-queue.ts";
export * from "./transition-table.ts";
export * from "./entry-exit-table.ts";
export * from "./machine.ts";
export * from "./machine-config.ts";
export * from "./to-dot.ts";
export * from "./to-mermaid.ts";
