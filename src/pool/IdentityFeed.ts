import { Identity } from '../interface/Account'
import { Mutex } from '../util/Mutex'

/** One-pass source of identities; each one is handed to exactly one caller */
export class IdentityFeed {
    private readonly identities: readonly Identity[]
    private cursor = 0
    private readonly mutex = new Mutex()

    constructor(identities: Identity[]) {
        this.identities = identities.map(identity => Object.freeze({ ...identity }))
    }

    get size(): number {
        return this.identities.length
    }

    /** null once the feed is exhausted */
    next(): Promise<Identity | null> {
        return this.mutex.runExclusive(() => {
            const identity = this.identities[this.cursor]
            if (identity === undefined) return null
            this.cursor += 1
            return identity
        })
    }

    remaining(): number {
        return this.identities.length - this.cursor
    }
}
