export default class Util {

    /** Sleep for `ms`; resolves early (without throwing) when `signal` aborts */
    async wait(ms: number, signal?: AbortSignal): Promise<void> {
        if (ms <= 0 || signal?.aborted) return

        return new Promise<void>(resolve => {
            const onAbort = () => {
                clearTimeout(timer)
                resolve()
            }
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort)
                resolve()
            }, ms)
            signal?.addEventListener('abort', onAbort, { once: true })
        })
    }

    randomNumber(min: number, max: number): number {
        if (min > max) [min, max] = [max, min]
        return Math.floor(Math.random() * (max - min + 1)) + min
    }

    chunkArray<T>(arr: T[], numChunks: number): T[][] {
        const chunkSize = Math.ceil(arr.length / Math.max(1, numChunks))
        const chunks: T[][] = []

        for (let i = 0; i < arr.length; i += chunkSize) {
            chunks.push(arr.slice(i, i + chunkSize))
        }

        return chunks
    }

    shuffleArray<T>(arr: T[]): T[] {
        for (let i = arr.length - 1; i > 0; i--) {
            const j = Math.floor(Math.random() * (i + 1))
            const a = arr[i]
            const b = arr[j]
            if (a === undefined || b === undefined) continue
            arr[i] = b
            arr[j] = a
        }
        return arr
    }

    /**
     * Accepts plain milliseconds or strings such as "500ms", "30s", "5min", "2h".
     * A bare numeric string is read as milliseconds.
     */
    stringToMs(input: string | number): number {
        if (typeof input === 'number') {
            if (!Number.isFinite(input) || input < 0) throw new Error(`Invalid duration: ${input}`)
            return Math.floor(input)
        }

        const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|sec|m|min|h|hr)?\s*$/i.exec(input)
        if (!match || match[1] === undefined) throw new Error(`Invalid duration: "${input}"`)

        const value = parseFloat(match[1])
        const unit = (match[2] ?? 'ms').toLowerCase()
        const multipliers: Record<string, number> = {
            ms: 1,
            s: 1000,
            sec: 1000,
            m: 60000,
            min: 60000,
            h: 3600000,
            hr: 3600000
        }

        return Math.floor(value * (multipliers[unit] ?? 1))
    }
}
