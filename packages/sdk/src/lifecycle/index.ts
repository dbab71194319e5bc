/**
 * Lifecycle module - Declarative state machines for record lifecycles
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./types.js";

// State machine
export {
	LifecycleStateMachine,
	createState,
	createTransition,
} from "./state-machine.js";
