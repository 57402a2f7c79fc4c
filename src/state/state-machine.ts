import { DEFAULT_LOG_PREFIX, type ScopedLogger, scopeLogger } from "../utils/logger";

/** Allowed successors of every state. A state with none is terminal. */
export type TransitionTable<TState extends string> = Readonly<
	Record<TState, readonly TState[]>
>;

export type TransitionCallback<TState extends string> = (
	from: TState,
	to: TState,
) => void;

export interface StateMachineOptions<TState extends string> {
	transitions: TransitionTable<TState>;
	initial: TState;
	/** Receives listener failures. */
	log?: ScopedLogger;
}

export interface StateMachine<TState extends string> {
	readonly state: TState;
	canTransition(to: TState): boolean;
	/**
	 * Moves to `to` and announces it to every listener. Called from a
	 * listener, the state changes at once and the announcement waits until
	 * the current one has reached every listener.
	 * @throws Error if the table forbids the move
	 */
	transition(to: TState): void;
	onTransition(callback: TransitionCallback<TState>): () => void;
}

/**
 * Creates a table-driven state machine.
 *
 * Listeners run synchronously inside `transition()`; one that throws is
 * logged and the others still run. Announcements are delivered in the
 * order the transitions happened.
 *
 * @example
 * ```typescript
 * const machine = createStateMachine({
 *   initial: 'idle',
 *   transitions: { idle: ['busy'], busy: ['idle', 'closed'], closed: [] },
 * });
 *
 * machine.onTransition((from, to) => {
 *   console.log(`State changed: ${from} -> ${to}`);
 * });
 *
 * machine.transition('busy');
 * ```
 */
export function createStateMachine<TState extends string>(
	options: StateMachineOptions<TState>,
): StateMachine<TState> {
	const {
		transitions,
		initial,
		log = scopeLogger(console, DEFAULT_LOG_PREFIX, "state-machine"),
	} = options;

	let current = initial;
	let announcing = false;
	const announcements: Array<{ from: TState; to: TState }> = [];
	const listeners = new Set<TransitionCallback<TState>>();

	function canTransition(to: TState): boolean {
		return transitions[current].includes(to);
	}

	function announce(from: TState, to: TState): void {
		for (const listener of [...listeners]) {
			try {
				listener(from, to);
			} catch (e) {
				log.error(`Listener for ${from} -> ${to} threw:`, e);
			}
		}
	}

	function transition(to: TState): void {
		if (!canTransition(to)) {
			throw new Error(`Invalid state transition: ${current} -> ${to}`);
		}

		announcements.push({ from: current, to });
		current = to;
		if (announcing) {
			return;
		}

		announcing = true;
		try {
			let next = announcements.shift();
			while (next) {
				announce(next.from, next.to);
				next = announcements.shift();
			}
		} finally {
			announcing = false;
		}
	}

	return {
		get state() {
			return current;
		},
		canTransition,
		transition,
		onTransition(callback) {
			listeners.add(callback);
			return () => {
				listeners.delete(callback);
			};
		},
	};
}
