import { expect, expectTypeOf, test, vi } from "vitest";
import {
	InternalError,
	Machine,
	NoTransitionError,
	TransitionFailure,
	type FSMKey,
	type Logger,
} from "../src/mod.ts";

type STATES = "A" | "B" | "C";
type EVENTS = "go" | "stay" | "back" | "boom";
type CTX = { log: string[] };

const create = () =>
	new Machine<STATES, EVENTS, CTX, number>({
		name: "test",
		initial: "A",
		context: () => ({ log: [] }),
	});

test("transition moves to target and runs handler once with payload", () => {
	const m = create();
	const handler = vi.fn((ctx: CTX, event: EVENTS, payload: number | undefined) => {
		ctx.log.push(`${event}:${payload}`);
	});

	expect(m.registerTransition("A", "go", "B", handler)).toBe(true);
	expect(m.enqueue([{ event: "go", payload: 42 }])).toBe(1);
	expect(m.pending).toBe(true);

	expect(m.process()).toBe(1);
	expect(m.state).toBe("B");
	expect(m.previous).toBe("A");
	expect(m.is("B")).toBe(true);
	expect(m.pending).toBe(false);
	expect(handler).toHaveBeenCalledTimes(1);
	expect(m.extendedState.log).toEqual(["go:42"]);
});

test("missing transition throws NoTransitionError and keeps state", () => {
	const m = create();
	m.registerTransition("B", "go", "C", () => {});
	m.enqueue([{ event: "go" }]);

	let error: unknown;
	try {
		m.process();
	} catch (e) {
		error = e;
	}
	expect(error).toBeInstanceOf(NoTransitionError);
	expect(error).toMatchObject({ kind: "NoTransition", event: "go", state: "A" });
	expect(m.state).toBe("A");
	expect(m.pending).toBe(false);
});

test("exit hook, handler, enter hook run in order around an external transition", () => {
	const m = create();
	m.registerExitHook("A", (ctx) => {
		ctx.log.push("exit:A");
	});
	m.registerEntryHook("B", (ctx) => {
		ctx.log.push("enter:B");
	});
	m.registerEntryHook("A", (ctx) => {
		ctx.log.push("enter:A");
	});
	m.registerTransition("A", "go", "B", (ctx) => {
		ctx.log.push("handler");
	});

	m.enqueue([{ event: "go" }]);
	m.process();

	expect(m.extendedState.log).toEqual(["exit:A", "handler", "enter:B"]);
});

test("self transition runs the handler but no hooks", () => {
	const m = create();
	m.registerExitHook("A", (ctx) => {
		ctx.log.push("exit:A");
	});
	m.registerEntryHook("A", (ctx) => {
		ctx.log.push("enter:A");
	});
	m.registerTransition("A", "stay", "A", (ctx) => {
		ctx.log.push("stay");
	});

	m.enqueue([{ event: "stay" }, { event: "stay" }]);
	expect(m.process()).toBe(2);

	expect(m.state).toBe("A");
	expect(m.extendedState.log).toEqual(["stay", "stay"]);
});

test("emitted events are deferred to the next wave", () => {
	const m = create();
	m.registerTransition("A", "go", "B", (ctx) => {
		ctx.log.push("A-go");
		return [{ event: "go" }];
	});
	m.registerTransition("B", "go", "C", (ctx) => {
		ctx.log.push("B-go");
	});

	m.enqueue([{ event: "go" }]);
	expect(m.process()).toBe(1);
	expect(m.state).toBe("B");
	expect(m.pending).toBe(true);
	expect(m.extendedState.log).toEqual(["A-go"]);

	expect(m.process()).toBe(1);
	expect(m.state).toBe("C");
	expect(m.pending).toBe(false);
	expect(m.extendedState.log).toEqual(["A-go", "B-go"]);
});

test("process returns the wave size, not the cascaded count", () => {
	const m = create();
	m.registerTransition("A", "stay", "A", () => [
		{ event: "stay" },
		{ event: "stay" },
	]);

	m.enqueue([{ event: "stay" }, { event: "stay" }]);
	expect(m.process()).toBe(2);
	expect(m.pending).toBe(true);
	expect(m.process()).toBe(4);
});

test("events emitted by hooks are queued too", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {});
	m.registerTransition("B", "back", "A", () => {});
	m.registerEntryHook("B", () => [{ event: "back" }]);

	m.enqueue([{ event: "go" }]);
	m.process();
	expect(m.state).toBe("B");
	expect(m.pending).toBe(true);

	m.process();
	expect(m.state).toBe("A");
});

test("re-registering reports overwrite and uses the latest entry", () => {
	const m = create();
	expect(m.registerTransition("A", "go", "B", () => {}, "first")).toBe(true);
	expect(m.registerTransition("A", "go", "C", () => {}, "second")).toBe(false);
	expect(m.registerEntryHook("C", () => {})).toBe(true);
	expect(m.registerEntryHook("C", () => {})).toBe(false);
	expect(m.registerExitHook("C", () => {})).toBe(true);

	m.enqueue([{ event: "go" }]);
	m.process();
	expect(m.state).toBe("C");
	expect(m.snapshot().transitions).toEqual([
		{ state: "A", event: "go", target: "C", name: "second" },
	]);
});

test("first failure stops the wave and drops the rest", () => {
	const m = create();
	m.registerTransition("A", "go", "B", (ctx) => {
		ctx.log.push("e1");
	});
	m.registerTransition("B", "boom", "C", () => {
		throw new Error("broken");
	});
	m.registerTransition("B", "go", "C", (ctx) => {
		ctx.log.push("e3");
	});

	m.enqueue([{ event: "go" }, { event: "boom" }, { event: "go" }]);

	let error: unknown;
	try {
		m.process();
	} catch (e) {
		error = e;
	}

	expect(error).toBeInstanceOf(InternalError);
	expect(error).toMatchObject({ kind: "InternalError", event: "boom", state: "B" });
	expect(error instanceof InternalError && error.cause).toBeInstanceOf(Error);
	// e1 effects are kept, e3 never ran and is gone
	expect(m.state).toBe("B");
	expect(m.extendedState.log).toEqual(["e1"]);
	expect(m.pending).toBe(false);
});

test("failing exit hook leaves the state and skips the handler", () => {
	const m = create();
	const handler = vi.fn();
	m.registerExitHook("A", () => {
		throw new Error("no exit");
	});
	m.registerTransition("A", "go", "B", handler);

	m.enqueue([{ event: "go" }]);
	expect(() => m.process()).toThrow(InternalError);
	expect(m.state).toBe("A");
	expect(handler).not.toHaveBeenCalled();
});

test("failing enter hook keeps the new state", () => {
	const m = create();
	m.registerEntryHook("B", () => {
		throw new TransitionFailure("enter failed");
	});
	m.registerTransition("A", "go", "B", () => [{ event: "back" }]);

	m.enqueue([{ event: "go" }]);
	// engine errors thrown by hooks are passed through unchanged
	expect(() => m.process()).toThrow(TransitionFailure);
	expect(m.state).toBe("B");
	// events returned by the handler before the failure stay queued
	expect(m.pending).toBe(true);
});

test("tryProcess reports errors as values", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {});

	m.enqueue([{ event: "go" }]);
	expect(m.tryProcess()).toEqual({ ok: true, processed: 1 });

	m.enqueue([{ event: "go" }]);
	const result = m.tryProcess();
	expect(result.ok).toBe(false);
	if (!result.ok) {
		expect(result.error).toBeInstanceOf(NoTransitionError);
		expect(result.error.message).toBe('No transition for event "go" in state "B"');
	}
});

test("run drains cascades and guards against endless loops", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => [{ event: "go" }]);
	m.registerTransition("B", "go", "C", () => [{ event: "back" }]);
	m.registerTransition("C", "back", "A", () => {});

	m.enqueue([{ event: "go" }]);
	expect(m.run()).toBe(3);
	expect(m.state).toBe("A");

	const loop = create();
	loop.registerTransition("A", "stay", "A", () => [{ event: "stay" }]);
	loop.enqueue([{ event: "stay" }]);
	expect(() => loop.run(5)).toThrow(TransitionFailure);
	expect(loop.pending).toBe(true);
});

test("re-entrant process and extended state access are rejected", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {
		m.process();
	});
	m.registerTransition("A", "stay", "A", () => {
		m.extendedState;
	});

	m.enqueue([{ event: "stay" }]);
	expect(() => m.process()).toThrow(TransitionFailure);
	expect(m.state).toBe("A");

	m.enqueue([{ event: "go" }]);
	expect(() => m.process()).toThrow(TransitionFailure);
	expect(m.state).toBe("A");

	// the guard is released after a failed wave
	expect(m.extendedState).toEqual({ log: [] });
});

test("canProcess checks the current state only", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {});
	expect(m.canProcess("go")).toBe(true);
	expect(m.canProcess("back")).toBe(false);
});

test("subscribe gets current data and every executed step", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {});
	m.registerTransition("B", "stay", "B", () => {});

	const log: unknown[] = [];
	const unsub = m.subscribe(({ current, previous }) => log.push({ current, previous }));

	m.enqueue([{ event: "go" }, { event: "stay" }]);
	m.process();
	unsub();

	m.registerTransition("B", "back", "A", () => {});
	m.enqueue([{ event: "back" }]);
	m.process();

	expect(log).toEqual([
		{ current: "A", previous: null },
		{ current: "B", previous: "A" },
		{ current: "B", previous: "B" },
	]);
});

test("debug mode traces through the logger", () => {
	const lines: string[] = [];
	const record = (...args: unknown[]) => {
		const line = args.map(String).join(" ");
		lines.push(line);
		return line;
	};
	const logger: Logger = { debug: record, log: record, warn: record, error: record };

	const m = new Machine<STATES, EVENTS, CTX>({
		name: "traced",
		initial: "A",
		context: { log: [] },
		debug: true,
		logger,
	});
	m.registerTransition("A", "go", "B", () => {});
	m.enqueue([{ event: "go" }]);
	m.process();

	expect(lines[0]).toBe('[FSM] traced: created with initial state "A"');
	expect(lines).toContain('[FSM] traced: "A" -> "B"');

	const quiet = create();
	expect(quiet.debug).toBe(false);
});

test("states and events may be any comparable values", () => {
	enum S {
		Off,
		On,
	}
	const toggle = Symbol("toggle");
	const m = new Machine<S, symbol, { flips: number }>({
		name: "enum",
		initial: S.Off,
		context: { flips: 0 },
	});
	m.registerTransition(S.Off, toggle, S.On, (ctx) => {
		ctx.flips++;
	});
	m.registerTransition(S.On, toggle, S.Off, (ctx) => {
		ctx.flips++;
	});

	m.enqueue([{ event: toggle }, { event: toggle }, { event: toggle }]);
	m.process();
	expect(m.state).toBe(S.On);
	expect(m.extendedState.flips).toBe(3);
});

test("a plain object context is copied, not shared with the caller", () => {
	const initial = { count: 0 };
	const m = new Machine<"A" | "B", "go", { count: number }>({
		name: "copy",
		initial: "A",
		context: initial,
	});
	m.registerTransition("A", "go", "B", (ctx) => {
		ctx.count++;
	});

	initial.count = 99;
	expect(m.extendedState.count).toBe(0);

	m.enqueue([{ event: "go" }]);
	m.process();
	expect(m.extendedState.count).toBe(1);
	expect(initial.count).toBe(99);
});

test("states and events are compared by value", () => {
	expectTypeOf<"A" | 1 | symbol>().toMatchTypeOf<FSMKey>();
	expectTypeOf<{ type: string }>().not.toMatchTypeOf<FSMKey>();

	const m = new Machine<string, string, null>({
		name: "keys",
		initial: "A",
		context: null,
	});
	const built = ["g", "o"].join("");
	expect(m.registerTransition("A", "go", "B", () => {})).toBe(true);
	expect(m.registerTransition("A", built, "C", () => {})).toBe(false);

	m.enqueue([{ event: "go" }]);
	m.process();
	expect(m.state).toBe("C");
});

test("subscribers are notified when the enter hook fails", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {});
	m.registerEntryHook("B", () => {
		throw new Error("enter failed");
	});

	const log: unknown[] = [];
	m.subscribe(({ current, previous }) => log.push({ current, previous }));

	m.enqueue([{ event: "go" }]);
	expect(() => m.process()).toThrow(InternalError);
	expect(log).toEqual([
		{ current: "A", previous: null },
		{ current: "B", previous: "A" },
	]);
});

test("re-registered hooks replace the earlier ones", () => {
	const m = create();
	m.registerTransition("A", "go", "B", () => {});
	m.registerEntryHook("B", (ctx) => {
		ctx.log.push("enter 1");
	});
	m.registerEntryHook("B", (ctx) => {
		ctx.log.push("enter 2");
	});
	m.registerExitHook("A", (ctx) => {
		ctx.log.push("exit 1");
	});
	m.registerExitHook("A", (ctx) => {
		ctx.log.push("exit 2");
	});

	m.enqueue([{ event: "go" }]);
	m.process();
	expect(m.extendedState.log).toEqual(["exit 2", "enter 2"]);
});
