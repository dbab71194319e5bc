/**
 * Lifecycle layer types
 *
 * Types for declaring a record's lifecycle as states, actions and guarded
 * transitions.
 */

/**
 * Generic state definition for a lifecycle state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
	TContext,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
	/** Optional guard condition that must be true for transition to occur */
	guard?: (context: TContext) => boolean;
	/** Message of the error raised when the guard rejects the transition */
	guardMessage?: string;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
	TContext = void,
> {
	/** Initial state of a new record */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction, TContext>[];
}
