/** An event waiting to be processed, with its optional payload. */
export type QueuedEvent<TEvent, TPayload> = {
	event: TEvent;
	payload?: TPayload;
};

/** FIFO of events awaiting processing. */
export class EventQueue<TEvent, TPayload> {
	#items: QueuedEvent<TEvent, TPayload>[] = [];

	/** Appends to the back, in the given order. Returns how many were added. */
	push(events: Iterable<QueuedEvent<TEvent, TPayload>>): number {
		let count = 0;
		for (const e of events) {
			this.#items.push(e);
			count++;
		}
		return count;
	}

	/** Removes and returns everything queued, leaving the queue empty. */
	drain(): QueuedEvent<TEvent, TPayload>[] {
		const items = this.#items;
		this.#items = [];
		return items;
	}

	get pending(): boolean {
		return this.#items.length > 0;
	}

	get size(): number {
		return this.#items.length;
	}
}
