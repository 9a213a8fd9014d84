/**
 * A small typed event emitter with no external dependencies.
 *
 * `Events` maps event names to payload types, so `emit("goal:start", …)`
 * only accepts the payload declared for `"goal:start"`.
 */

export type EventHandler<T> = (data: T) => void;

export interface EventBus<Events extends object> {
	on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void;
	off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void;
	once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void;
	emit<K extends keyof Events>(event: K, data: Events[K]): void;
	removeAll(event?: keyof Events): void;
	listenerCount(event: keyof Events): number;
}

/**
 * Create a typed event bus.
 *
 * Handlers that throw are isolated so one broken listener cannot stop the
 * others, or the emitter, from running. Pass `onHandlerError` to observe them.
 *
 * @example
 * ```ts
 * const bus = createEventBus<{ "goal:start": { name: string } }>();
 * bus.on("goal:start", ({ name }) => console.log(name));
 * bus.emit("goal:start", { name: "Refactor auth" });
 * ```
 */
export function createEventBus<Events extends object>(
	onHandlerError?: (event: keyof Events, error: unknown) => void,
): EventBus<Events> {
	type Registry = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };
	let listeners: Registry = {};

	function handlersFor<K extends keyof Events>(event: K): Set<EventHandler<Events[K]>> {
		const existing = listeners[event];
		if (existing) return existing;
		const created = new Set<EventHandler<Events[K]>>();
		listeners[event] = created;
		return created;
	}

	return {
		on(event, handler) {
			handlersFor(event).add(handler);
		},

		off(event, handler) {
			listeners[event]?.delete(handler);
		},

		once(event, handler) {
			const wrapper: typeof handler = (data) => {
				listeners[event]?.delete(wrapper);
				handler(data);
			};
			handlersFor(event).add(wrapper);
		},

		emit(event, data) {
			const handlers = listeners[event];
			if (!handlers) return;
			for (const handler of [...handlers]) {
				try {
					handler(data);
				} catch (err) {
					onHandlerError?.(event, err);
				}
			}
		},

		removeAll(event) {
			if (event === undefined) {
				listeners = {};
			} else {
				delete listeners[event];
			}
		},

		listenerCount(event) {
			return listeners[event]?.size ?? 0;
		},
	};
}
