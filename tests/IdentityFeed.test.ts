import { describe, expect, it } from 'vitest'

import { IdentityFeed } from '../src/pool/IdentityFeed'
import { makeIdentity } from './fakes'

describe('IdentityFeed', () => {
    it('hands out identities in order, then null', async () => {
        const feed = new IdentityFeed([makeIdentity(1), makeIdentity(2)])

        expect(feed.size).toBe(2)
        expect(await feed.next()).toEqual(makeIdentity(1))
        expect(feed.remaining()).toBe(1)
        expect(await feed.next()).toEqual(makeIdentity(2))
        expect(await feed.next()).toBeNull()
        expect(await feed.next()).toBeNull()
        expect(feed.remaining()).toBe(0)
    })

    it('gives each identity to exactly one concurrent caller', async () => {
        const feed = new IdentityFeed(Array.from({ length: 25 }, (_, i) => makeIdentity(i)))

        const taken = await Promise.all(Array.from({ length: 40 }, () => feed.next()))
        const emails = taken.flatMap(identity => identity ? [identity.email] : [])

        expect(emails).toHaveLength(25)
        expect(new Set(emails).size).toBe(25)
    })

    it('hands out frozen copies', async () => {
        const source = makeIdentity(1)
        const feed = new IdentityFeed([source])
        source.password = 'changed'

        const identity = await feed.next()
        expect(identity?.password).toBe('test-secret')
        expect(Object.isFrozen(identity)).toBe(true)
    })
})
