import type { TaskState } from "@/types";

/**
 * Allowed task transitions. Anything not listed is a programming error and
 * throws, so every state change in DownloadTask goes through `transition`.
 */
const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
    queued: ["planning", "cancelled"],
    planning: ["downloading", "paused", "failed", "cancelled"],
    downloading: ["paused", "finalizing", "failed", "cancelled", "planning"],
    paused: ["queued", "planning", "downloading", "cancelled"],
    finalizing: ["completed", "failed", "cancelled"],
    failed: ["queued", "cancelled"],
    completed: [],
    cancelled: [],
};

export const TERMINAL_STATES: readonly TaskState[] = ["completed", "cancelled"];

export function canTransition(from: TaskState, to: TaskState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: TaskState): boolean {
    return TERMINAL_STATES.includes(state);
}

export class InvalidTransitionError extends Error {
    constructor(
        readonly from: TaskState,
        readonly to: TaskState
    ) {
        super(`Invalid task transition ${from} -> ${to}`);
        this.name = "InvalidTransitionError";
    }
}

export class TaskStateMachine {
    private current: TaskState;

    constructor(
        initial: TaskState = "queued",
        private readonly onTransition?: (from: TaskState, to: TaskState) => void
    ) {
        this.current = initial;
    }

    get state(): TaskState {
        return this.current;
    }

    is(...states: TaskState[]): boolean {
        return states.includes(this.current);
    }

    transition(to: TaskState): void {
        const from = this.current;
        if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
        this.current = to;
        this.onTransition?.(from, to);
    }
}
