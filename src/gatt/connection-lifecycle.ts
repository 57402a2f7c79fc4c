import {
	CONNECT_KEY,
	type ConnectKey,
	createPendingTable,
	formatOperationKey,
	type Waiter,
} from "../correlation";
import {
	AlreadyConnectingError,
	ConnectionLostError,
	DiscoveryStartFailedError,
	normalizeError,
} from "../errors";
import {
	createStateMachine,
	type TransitionCallback,
	type TransitionTable,
} from "../state";
import { type ConnectionState, GATT_SUCCESS, type GattTransport } from "../types";
import type { ScopedLogger } from "../utils/logger";

/** `disconnected` and `failed` are terminal: a new connection needs a new instance. */
export const CONNECTION_TRANSITIONS: TransitionTable<ConnectionState> = {
	idle: ["connecting"],
	connecting: ["discovering-services", "disconnected", "failed"],
	"discovering-services": ["ready", "disconnected", "failed"],
	ready: ["disconnected", "failed"],
	disconnected: [],
	failed: [],
};

export interface ConnectionLifecycleOptions {
	transport: Pick<GattTransport, "discoverServices">;
	log: ScopedLogger;
	/** Reports a connect result that arrived with nobody waiting for it. */
	onAnomaly?: (key: ConnectKey, outcome: "resolve" | "fail") => void;
}

/**
 * Connection state machine plus the single connect waiter.
 *
 * Only the event dispatcher drives the link transitions
 * (`linkEstablished`, `discoveryComplete`, `linkLost`, `fail`);
 * `issueConnect` is the caller-side entry point.
 *
 * The connect waiter is settled before a transition is announced, so a
 * transition listener never sees it pending.
 */
export interface ConnectionLifecycle {
	getState(): ConnectionState;

	/** The error that moved the connection to `failed`, else `null`. */
	readonly failureReason: Error | null;

	isConnectPending(): boolean;

	/**
	 * idle -> connecting. Registers the connect waiter.
	 * @throws AlreadyConnectingError if connect was already issued
	 */
	issueConnect(): Waiter<ConnectKey, void>;

	/** connecting -> discovering-services, and starts discovery. */
	linkEstablished(): void;

	/** discovering-services -> ready, and completes the connect waiter. */
	discoveryComplete(status: number): void;

	/**
	 * Any state past idle -> disconnected. Fails the connect waiter if pending.
	 * @returns false if the connection was idle or already terminal
	 */
	linkLost(): boolean;

	/**
	 * Any state past idle -> failed. Fails the connect waiter if pending.
	 * @returns false if the connection was idle or already terminal
	 */
	fail(error: Error): boolean;

	onTransition(callback: TransitionCallback<ConnectionState>): () => void;
}

export function createConnectionLifecycle(
	options: ConnectionLifecycleOptions,
): ConnectionLifecycle {
	const { transport, log, onAnomaly } = options;
	const machine = createStateMachine({
		transitions: CONNECTION_TRANSITIONS,
		initial: "idle",
		log,
	});
	const connects = createPendingTable<ConnectKey, void>({
		keyId: formatOperationKey,
		...(onAnomaly && { onAnomaly }),
	});
	let failureReason: Error | null = null;

	function failConnect(error: Error): void {
		if (connects.has(CONNECT_KEY)) {
			connects.fail(CONNECT_KEY, error);
		}
	}

	function issueConnect(): Waiter<ConnectKey, void> {
		const state = machine.state;
		if (connects.has(CONNECT_KEY) || state !== "idle") {
			throw new AlreadyConnectingError(state);
		}
		const waiter = connects.register(CONNECT_KEY);
		machine.transition("connecting");
		return waiter;
	}

	function fail(error: Error): boolean {
		if (!machine.canTransition("failed")) {
			log.debug(`Ignoring failure in ${machine.state} state: ${error.message}`);
			return false;
		}
		failureReason = error;
		failConnect(error);
		machine.transition("failed");
		return true;
	}

	function linkEstablished(): void {
		const state = machine.state;
		if (state !== "connecting") {
			log.warn(`Link established in ${state} state, ignoring`);
			return;
		}

		log.debug("GATT connected, discover services");
		machine.transition("discovering-services");

		let started: boolean;
		try {
			started = transport.discoverServices();
		} catch (e) {
			fail(normalizeError(e));
			return;
		}
		if (!started) {
			fail(new DiscoveryStartFailedError());
		}
	}

	function discoveryComplete(status: number): void {
		const state = machine.state;
		if (state !== "discovering-services") {
			log.warn(`Services discovered in ${state} state, ignoring`);
			return;
		}
		if (status !== GATT_SUCCESS) {
			log.warn(`Service discovery finished with status ${status}`);
		}

		log.debug("Services discovered");
		connects.resolve(CONNECT_KEY, undefined);
		machine.transition("ready");
	}

	function linkLost(): boolean {
		if (!machine.canTransition("disconnected")) {
			log.debug(`Link lost in ${machine.state} state, ignoring`);
			return false;
		}
		failConnect(new ConnectionLostError());
		machine.transition("disconnected");
		return true;
	}

	return {
		getState: () => machine.state,
		get failureReason() {
			return failureReason;
		},
		isConnectPending: () => connects.has(CONNECT_KEY),
		issueConnect,
		linkEstablished,
		discoveryComplete,
		linkLost,
		fail,
		onTransition: (callback) => machine.onTransition(callback),
	};
}
