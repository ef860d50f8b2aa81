import { Machine, type Logger } from "../machine.ts";

/**
 * Coin operated still: waits closed for money, checks the coin, opens on a
 * good one and closes again on timeout. Counts accepted coins, openings and
 * closings in its extended state.
 */
export type CoinStillState = "Closed" | "Checking" | "Open";

export type CoinStillEvent = "GotCoin" | "AcceptMoney" | "RejectMoney" | "Timeout";

export type Coin = "good" | "bad";

export type CoinStillContext = {
	coins: number;
	opened: number;
	closed: number;
};

export type CoinStill = Machine<
	CoinStillState,
	CoinStillEvent,
	CoinStillContext,
	Coin
>;

export const COIN_STILL_STATES: CoinStillState[] = ["Closed", "Checking", "Open"];

export const COIN_STILL_EVENTS: CoinStillEvent[] = [
	"GotCoin",
	"AcceptMoney",
	"RejectMoney",
	"Timeout",
];

export function createCoinStill(
	options: { debug?: boolean; logger?: Logger } = {}
): CoinStill {
	const still = new Machine<
		CoinStillState,
		CoinStillEvent,
		CoinStillContext,
		Coin
	>({
		name: "coin_still",
		initial: "Closed",
		context: () => ({ coins: 0, opened: 0, closed: 0 }),
		...options,
	});

	still.registerTransition(
		"Closed",
		"GotCoin",
		"Checking",
		(_ctx, _event, coin) => {
			if (coin === undefined) throw new Error("coin argument missing");
			return [{ event: coin === "good" ? "AcceptMoney" : "RejectMoney" }];
		},
		"ProcessCoin"
	);
	still.registerTransition("Checking", "RejectMoney", "Closed", () => {}, "Rejected");
	still.registerTransition(
		"Checking",
		"GotCoin",
		"Checking",
		() => {},
		"IgnoreAnotherCoin"
	);
	still.registerTransition(
		"Checking",
		"AcceptMoney",
		"Open",
		(ctx) => {
			// openings and closings are counted by the hooks
			ctx.coins++;
		},
		"Accepted"
	);
	still.registerTransition(
		"Open",
		"GotCoin",
		"Open",
		() => [{ event: "RejectMoney" }],
		"Reject"
	);
	still.registerTransition("Open", "RejectMoney", "Open", () => {}, "Rejected");
	still.registerTransition("Open", "Timeout", "Closed", () => {}, "TimeOut");

	still.registerEntryHook("Open", (ctx) => {
		ctx.opened++;
	}, "CountOpens");
	still.registerExitHook("Open", (ctx) => {
		ctx.closed++;
	}, "CountClose");

	return still;
}
