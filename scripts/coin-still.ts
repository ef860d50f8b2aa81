#!/usr/bin/env -S npx tsx
/**
 * @module
 *
 * CLI harness driving the coin still example machine.
 *
 * @example
 * ```sh
 * npm run coin-still -- --events GotCoin:good,Timeout
 * npm run coin-still -- --dot --outfile still.dot
 * npm run coin-still -- --mermaid
 * ```
 *
 * Options:
 * - `--events <list>` - Comma separated events to enqueue, `GotCoin` takes `:good` or `:bad`
 * - `--dot` - Print (or write with `--outfile`) the Graphviz diagram
 * - `--outfile <path>` - Destination of the `--dot` output
 * - `--mermaid` - Print the Mermaid diagram
 * - `--debug` - Trace engine activity
 * - `--help` - Show help message
 */

import minimist from "minimist";
import {
	COIN_STILL_EVENTS,
	COIN_STILL_STATES,
	createCoinStill,
	type Coin,
	type CoinStillEvent,
	type CoinStillState,
} from "../src/examples/coin-still.ts";
import { FSMError, type QueuedEvent, toMermaid, writeDot } from "../src/mod.ts";

const args = minimist(process.argv.slice(2), {
	string: ["events", "outfile"],
	boolean: ["help", "dot", "mermaid", "debug"],
});

if (args.help) {
	console.log(`
coin-still - Drive the coin still state machine

Usage:
  npx tsx scripts/coin-still.ts [options]

Options:
  --events <list>   Comma separated events, e.g. "GotCoin:good,AcceptMoney,Timeout"
  --dot             Output the Graphviz diagram
  --outfile <path>  Write the --dot output to a file instead of stdout
  --mermaid         Output the Mermaid diagram
  --debug           Trace engine activity
  --help            Show this help message
`);
	process.exit(0);
}

const isEvent = (s: string): s is CoinStillEvent =>
	COIN_STILL_EVENTS.some((e) => e === s);

const isCoin = (s: string): s is Coin => s === "good" || s === "bad";

function parseEvents(list: string): QueuedEvent<CoinStillEvent, Coin>[] {
	return list
		.split(",")
		.map((s) => s.trim())
		.filter(Boolean)
		.map((item) => {
			const [event, coin] = item.split(":");
			if (!isEvent(event)) {
				throw new Error(`Unknown event "${event}" (${COIN_STILL_EVENTS.join(", ")})`);
			}
			if (coin === undefined) return { event };
			if (!isCoin(coin)) throw new Error(`Unknown coin "${coin}" (good, bad)`);
			return { event, payload: coin };
		});
}

const still = createCoinStill({ debug: args.debug });

try {
	if (args.events) {
		still.enqueue(parseEvents(args.events));
		const processed = still.run();
		console.log(`processed: ${processed}`);
		console.log(`state: ${still.state}`);
		console.log(`context: ${JSON.stringify(still.extendedState)}`);
	}

	const labels = {
		stateLabels: new Map(
			COIN_STILL_STATES.map((s): [CoinStillState, string] => [s, s])
		),
	};

	if (args.dot) {
		await writeDot(still.snapshot(), { ...labels, outfile: args.outfile });
	}

	if (args.mermaid) {
		console.log(toMermaid(still.snapshot(), labels));
	}
} catch (error) {
	if (error instanceof FSMError) {
		console.error(`FSM error (${error.kind}): ${error.message}`);
		console.error("The machine must be shut down.");
		process.exit(1);
	}
	console.error(`Error: ${error instanceof Error ? error.message : error}`);
	process.exit(1);
}
