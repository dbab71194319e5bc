/**
 * Lifecycle State Machine
 *
 * A generic state machine for record lifecycles. Supports typed guards
 * and state introspection.
 */

import { LedgerError } from "../core/types.js";
import {
	StateMachineConfig,
	StateDefinition,
	StateTransition,
} from "./types.js";

/**
 * Generic state machine for lifecycle management.
 *
 * Rejections map onto the ledger's error taxonomy:
 * - any action from a final state fails `ALREADY_FINALIZED`
 * - an action the current state does not allow fails `PRECONDITION_FAILED`
 * - a guard returning false fails `PRECONDITION_FAILED`
 *
 * @example
 * ```typescript
 * type DoorState = "closed" | "open" | "broken";
 * type DoorAction = "open" | "smash";
 *
 * const machine = new LifecycleStateMachine<DoorState, DoorAction, { key: boolean }>({
 *   initialState: "closed",
 *   states: [
 *     createState("closed", ["open", "smash"]),
 *     createState("open", []),
 *     createState("broken", [], { isFinal: true }),
 *   ],
 *   transitions: [
 *     createTransition("closed", "open", "open", { guard: (ctx) => ctx.key }),
 *     createTransition("closed", "smash", "broken"),
 *   ],
 * });
 *
 * machine.perform("open", { key: true }); // "open"
 * ```
 */
export class LifecycleStateMachine<
	TState extends string,
	TAction extends string,
	TContext = void,
> {
	private currentState: TState;
	private readonly config: StateMachineConfig<TState, TAction, TContext>;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<
		string,
		StateTransition<TState, TAction, TContext>
	>;

	constructor(
		config: StateMachineConfig<TState, TAction, TContext>,
		initialState?: TState,
	) {
		this.config = config;
		this.currentState = initialState ?? config.initialState;

		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}

		if (!this.stateMap.has(this.currentState)) {
			throw new LedgerError(
				`Unknown state: ${this.currentState}`,
				"PRECONDITION_FAILED",
				{
					state: this.currentState,
					validStates: Array.from(this.stateMap.keys()),
				},
			);
		}
	}

	/**
	 * Get the current state.
	 */
	getState(): TState {
		return this.currentState;
	}

	/**
	 * Check if an action is allowed from the current state.
	 * Guards are not evaluated.
	 */
	canPerform(action: TAction): boolean {
		const state = this.stateMap.get(this.currentState);
		return state?.allowedActions.includes(action) ?? false;
	}

	/**
	 * Get the list of allowed actions from the current state.
	 */
	getAllowedActions(): TAction[] {
		const state = this.stateMap.get(this.currentState);
		return state ? [...state.allowedActions] : [];
	}

	/**
	 * Get the transition for an action from the current state.
	 */
	getTransition(
		action: TAction,
	): StateTransition<TState, TAction, TContext> | undefined {
		return this.transitionMap.get(`${this.currentState}:${action}`);
	}

	/**
	 * Preview what state would result from an action without performing it.
	 */
	previewTransition(action: TAction): TState | undefined {
		return this.getTransition(action)?.to;
	}

	/**
	 * Perform an action, transitioning state if valid.
	 *
	 * @returns The new state after transition
	 * @throws LedgerError if the state is final, the action is not allowed,
	 * or the guard fails
	 */
	perform(action: TAction, context: TContext): TState {
		if (this.isFinal()) {
			throw new LedgerError(
				`Action "${action}" rejected: state "${this.currentState}" is final`,
				"ALREADY_FINALIZED",
				{ action, currentState: this.currentState },
			);
		}

		const transition = this.getTransition(action);
		if (!this.canPerform(action) || !transition) {
			throw new LedgerError(
				`Action "${action}" is not allowed from state "${this.currentState}"`,
				"PRECONDITION_FAILED",
				{
					action,
					currentState: this.currentState,
					allowedActions: this.getAllowedActions(),
				},
			);
		}

		if (transition.guard && !transition.guard(context)) {
			throw new LedgerError(
				transition.guardMessage ??
					`Guard condition failed for action "${action}"`,
				"PRECONDITION_FAILED",
				{ action, currentState: this.currentState },
			);
		}

		this.currentState = transition.to;
		return this.currentState;
	}

	/**
	 * Check if the current state is a final (terminal) state.
	 */
	isFinal(): boolean {
		return this.stateMap.get(this.currentState)?.isFinal ?? false;
	}

	/**
	 * Get all final (terminal) states.
	 */
	getFinalStates(): TState[] {
		return Array.from(this.stateMap.values())
			.filter((s) => s.isFinal)
			.map((s) => s.name);
	}

	/**
	 * Get the state machine configuration.
	 */
	getConfig(): StateMachineConfig<TState, TAction, TContext> {
		return this.config;
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<
	TState extends string,
	TAction extends string,
	TContext = void,
>(
	from: TState | TState[],
	action: TAction,
	to: TState,
	options: {
		guard?: (context: TContext) => boolean;
		guardMessage?: string;
	} = {},
): StateTransition<TState, TAction, TContext> {
	return {
		from,
		action,
		to,
		...options,
	};
}
