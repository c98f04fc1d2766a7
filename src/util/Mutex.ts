/**
 * FIFO async mutex. `runExclusive` callers queue behind each other; the
 * section is released even when the callback throws.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve()
    private held = false

    get locked(): boolean {
        return this.held
    }

    async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
        let release: () => void = () => undefined
        const next = new Promise<void>(resolve => { release = resolve })
        const previous = this.tail
        this.tail = previous.then(() => next)

        await previous
        this.held = true
        try {
            return await fn()
        } finally {
            this.held = false
            release()
        }
    }
}
