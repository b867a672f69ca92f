import { AlreadyTerminalError, InvalidTransitionError } from './errors.js';
import type { PaymentStatus } from './payment.js';

const TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
    pending: ['completed', 'expired', 'failed'],
    completed: [],
    expired: [],
    failed: [],
};

export function isTerminal(status: PaymentStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

export function canTransition(from: PaymentStatus, to: PaymentStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

/**
 * Throws when `from -> to` is not an edge of the lifecycle graph.
 * A terminal source yields AlreadyTerminalError so callers can treat a lost race as a no-op.
 */
export function assertTransition(paymentId: string, from: PaymentStatus, to: PaymentStatus): void {
    if (isTerminal(from)) {
        throw new AlreadyTerminalError(paymentId, from);
    }
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(from, to);
    }
}
