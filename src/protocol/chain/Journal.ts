/**
 * Checkpoint / rollback contract for every piece of engine state.
 *
 * checkpoint() captures the current state and returns a closure that puts it
 * back. Chain.execute takes a checkpoint of everything before a call and
 * invokes the rollbacks if the call throws.
 */

export type Rollback = () => void;

export interface Journaled {
    checkpoint(): Rollback;
}

export function checkpointAll(parts: Journaled[]): Rollback {
    const rollbacks = parts.map(part => part.checkpoint());
    return () => {
        // restore in reverse so nested owners see their children restored first
        for (let i = rollbacks.length - 1; i >= 0; i--) {
            rollbacks[i]();
        }
    };
}
