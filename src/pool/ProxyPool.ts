import { AccountProxy } from '../interface/Account'
import { formatProxy, proxyLabel } from '../util/Load'
import { log } from '../util/Logger'
import { Mutex } from '../util/Mutex'

interface PoolEntry {
    proxy: AccountProxy
    leased: boolean
    failures: number
    quarantined: boolean
}

export interface ProxyPoolStats {
    total: number
    free: number
    leased: number
    quarantined: number
}

/**
 * Hands out exclusive proxy leases. A proxy that reaches `failureThreshold`
 * failed releases is quarantined and never leased again.
 *
 * All bookkeeping (free queue, lease flags, quarantine) sits behind one mutex.
 */
export class ProxyPool {
    private readonly entries = new Map<string, PoolEntry>()
    private readonly freeQueue: string[] = []
    private readonly mutex = new Mutex()
    private readonly failureThreshold: number

    constructor(proxies: AccountProxy[], failureThreshold: number) {
        if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
            throw new Error(`failureThreshold must be a positive integer, got ${failureThreshold}`)
        }
        this.failureThreshold = failureThreshold

        for (const proxy of proxies) {
            const key = formatProxy(proxy)
            if (this.entries.has(key)) continue
            this.entries.set(key, { proxy, leased: false, failures: 0, quarantined: false })
            this.freeQueue.push(key)
        }
    }

    get size(): number {
        return this.entries.size
    }

    /** Returns a free proxy, or null when none is free right now (not an error) */
    lease(): Promise<AccountProxy | null> {
        return this.mutex.runExclusive(() => {
            const key = this.freeQueue.shift()
            if (key === undefined) return null

            const entry = this.entries.get(key)
            if (!entry || entry.leased || entry.quarantined) {
                throw new Error(`Proxy pool corrupted: ${key} queued while not free`)
            }

            entry.leased = true
            return entry.proxy
        })
    }

    /** Give a lease back; a failed release counts towards quarantine */
    release(proxy: AccountProxy, success: boolean): Promise<void> {
        return this.mutex.runExclusive(() => {
            const key = formatProxy(proxy)
            const entry = this.entries.get(key)
            if (!entry || !entry.leased) {
                throw new Error(`Release of a proxy that is not leased: ${proxyLabel(proxy)}`)
            }

            entry.leased = false

            if (!success) {
                entry.failures += 1
                if (entry.failures >= this.failureThreshold) {
                    entry.quarantined = true
                    log('main', 'PROXY-POOL', `Quarantined ${proxyLabel(proxy)} after ${entry.failures} failure(s)`, 'warn')
                    return
                }
            }

            this.freeQueue.push(key)
        })
    }

    /** Proxies that can still be leased now or later (free + leased) */
    usable(): number {
        let count = 0
        for (const entry of this.entries.values()) {
            if (!entry.quarantined) count++
        }
        return count
    }

    failures(proxy: AccountProxy): number {
        return this.entries.get(formatProxy(proxy))?.failures ?? 0
    }

    stats(): ProxyPoolStats {
        const stats: ProxyPoolStats = { total: this.entries.size, free: 0, leased: 0, quarantined: 0 }
        for (const entry of this.entries.values()) {
            if (entry.quarantined) stats.quarantined++
            else if (entry.leased) stats.leased++
            else stats.free++
        }
        return stats
    }
}
