import type { LaunchStep, StepStatus } from './types';

export const MAX_STEPS = 50;

/**
 * Append-only audit trail of one launch attempt. Entries are frozen on insert.
 */
export class StepLog {
    private steps: LaunchStep[] = [];

    constructor(private readonly capacity: number = MAX_STEPS) { }

    append(status: StepStatus, message: string, at: number = Date.now()): LaunchStep {
        const step: LaunchStep = Object.freeze({ status, message, at });
        this.steps.push(step);
        if (this.steps.length > this.capacity) {
            this.steps.splice(0, this.steps.length - this.capacity);
        }
        return step;
    }

    clear(): void {
        this.steps = [];
    }

    entries(): LaunchStep[] {
        return [...this.steps];
    }

    get length(): number {
        return this.steps.length;
    }
}
