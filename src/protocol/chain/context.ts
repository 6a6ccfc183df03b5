/**
 * Per-call execution context handed to every state-changing operation.
 */
export interface CallContext {
    // account that initiated the call
    readonly sender: string;
    // account the call is addressed to; receives `value`
    readonly target: string | undefined;
    // native value attached to the call, already credited to `target`
    readonly value: bigint;
    // block time of the call, seconds
    readonly timestamp: number;
}

