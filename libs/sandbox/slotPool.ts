/**
 * Sandbox Slot Pool
 *
 * Process-wide cap on live sandbox instances. Sessions take one slot per
 * VALIDATE and give it back before their next proposal.
 */

import { logger } from '../logging/logger.js';
import { SessionCancelledError } from '../errors/InfrastructureError.js';

export interface SandboxSlot {
    readonly slotNumber: number;
    release(): void;
}

interface Waiter {
    resolve: (slot: SandboxSlot) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Sandbox concurrency limiter.
 * Counting semaphore shared by every session; waiters are served FIFO.
 * A slot is released at most once, however many times release() is called.
 */
export class SandboxSlotPool {
    private active = 0;
    private issued = 0;
    private readonly waiters: Waiter[] = [];

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Sandbox slot capacity must be a positive integer, got ${capacity}`);
        }
    }

    get inUse(): number {
        return this.active;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    /**
     * Wait for a free slot.
     * @throws SessionCancelledError if the signal fires before a slot frees up
     */
    acquire(signal?: AbortSignal): Promise<SandboxSlot> {
        if (signal?.aborted) {
            return Promise.reject(new SessionCancelledError());
        }

        if (this.active < this.capacity) {
            this.active += 1;
            return Promise.resolve(this.createSlot());
        }

        logger.debug({ capacity: this.capacity, waiting: this.waiters.length + 1 }, 'Sandbox slots exhausted, queueing');

        return new Promise<SandboxSlot>((resolve, reject) => {
            const waiter: Waiter = { resolve, signal };
            if (signal) {
                waiter.onAbort = () => {
                    const index = this.waiters.indexOf(waiter);
                    if (index >= 0) {
                        this.waiters.splice(index, 1);
                    }
                    reject(new SessionCancelledError());
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            this.waiters.push(waiter);
        });
    }

    private createSlot(): SandboxSlot {
        this.issued += 1;
        let released = false;
        return {
            slotNumber: this.issued,
            release: () => {
                if (released) return;
                released = true;
                this.handOff();
            }
        };
    }

    private handOff(): void {
        const next = this.waiters.shift();
        if (!next) {
            this.active -= 1;
            return;
        }
        if (next.signal && next.onAbort) {
            next.signal.removeEventListener('abort', next.onAbort);
        }
        // The freed slot passes straight to the next waiter; active is unchanged.
        next.resolve(this.createSlot());
    }
}
