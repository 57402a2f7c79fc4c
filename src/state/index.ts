export {
	createEventEmitter,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	createStateMachine,
	type StateMachine,
	type StateMachineOptions,
	type TransitionCallback,
	type TransitionTable,
} from "./state-machine";
