/**
 * Block time source, in whole seconds.
 */
export interface Clock {
    now(): number;
}

export class SystemClock implements Clock {
    now(): number {
        return Math.floor(Date.now() / 1000);
    }
}

/**
 * Settable clock. Time never moves backwards.
 */
export class ManualClock implements Clock {
    private current: number;

    constructor(start: number = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        if (timestamp < this.current) {
            throw new Error(`Clock cannot move backwards: ${timestamp} < ${this.current}`);
        }
        this.current = timestamp;
    }

    advance(seconds: number): number {
        this.set(this.current + seconds);
        return this.current;
    }
}
