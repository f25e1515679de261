/**
 * Anti-Ban System - request pacing and backend cooldown
 *
 * - RateLimiter: one outbound request at a time, FIFO, with a random gap
 *   between consecutive request starts
 * - BackendCooldown: a backend that got blocked sits out for a while,
 *   longer for every consecutive block
 */

export interface Clock {
    now: () => number;
    sleep: (ms: number) => Promise<void>;
    random: () => number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
    random: () => Math.random(),
};

/**
 * Random delay in [min, max] (inclusive, whole milliseconds)
 */
export function getRandomDelay(min: number, max: number, random: () => number = Math.random): number {
    return Math.floor(random() * (max - min + 1)) + min;
}

export async function randomSleep(min: number, max: number, clock: Clock = systemClock): Promise<void> {
    await clock.sleep(getRandomDelay(min, max, clock.random));
}

// ═══════════════════════════════════════════════════════════════
// RATE LIMITER
// ═══════════════════════════════════════════════════════════════

export class RateLimiter {
    private tail: Promise<void> = Promise.resolve();
    private lastStart: number | null = null;

    constructor(
        private readonly minDelayMs: number,
        private readonly maxDelayMs: number,
        private readonly clock: Clock = systemClock,
    ) {
        if (minDelayMs > maxDelayMs) {
            throw new RangeError('minDelayMs cannot exceed maxDelayMs');
        }
    }

    /**
     * Queue a task. It starts once every earlier task has settled and the
     * random gap since the previous start has elapsed.
     */
    schedule<T>(task: () => Promise<T>): Promise<T> {
        const run = this.tail.then(async () => {
            await this.waitTurn();
            return task();
        });
        // Keep the chain alive whatever the task does
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private async waitTurn(): Promise<void> {
        if (this.lastStart !== null) {
            const gap = getRandomDelay(this.minDelayMs, this.maxDelayMs, this.clock.random);
            const wait = this.lastStart + gap - this.clock.now();
            if (wait > 0) await this.clock.sleep(wait);
        }
        this.lastStart = this.clock.now();
    }
}

// ═══════════════════════════════════════════════════════════════
// BACKEND COOLDOWN
// ═══════════════════════════════════════════════════════════════

const MAX_COOLDOWN_MULTIPLIER = 8;

export class BackendCooldown {
    private until = 0;
    private streak = 0;

    constructor(
        private readonly baseCooldownMs: number,
        private readonly now: () => number = Date.now,
    ) {}

    isCoolingDown(): boolean {
        return this.now() < this.until;
    }

    /** Remaining cooldown in ms (0 when usable) */
    remaining(): number {
        return Math.max(0, this.until - this.now());
    }

    /** Returns the cooldown applied */
    markBlocked(): number {
        const multiplier = Math.min(2 ** this.streak, MAX_COOLDOWN_MULTIPLIER);
        const cooldown = this.baseCooldownMs * multiplier;
        this.streak++;
        this.until = this.now() + cooldown;
        return cooldown;
    }

    markSuccess(): void {
        this.streak = 0;
        this.until = 0;
    }
}
