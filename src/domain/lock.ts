/**
 * Key-based mutual exclusion for booking commits
 *
 * acquire/release give mutex-like behavior per key (a "date:time" slot).
 * A lock TTL keeps a crashed holder from blocking the slot forever.
 * Acquisition never waits: a held, unexpired lock makes `acquire` return false.
 */
export class KeyedLock {
    private readonly _locks: Map<string, number> = new Map();

    /**
     * @param key - Lock key
     * @param ttlMs - Lock time-to-live in milliseconds (default: 5000)
     * @returns true if acquired, false if another holder has it
     */
    acquire(key: string, ttlMs: number = 5000): boolean {
        const now = Date.now();
        const existing = this._locks.get(key);
        if (existing && existing > now) {
            return false;
        }
        this._locks.set(key, now + ttlMs);
        return true;
    }

    release(key: string) {
        this._locks.delete(key);
    }
}
