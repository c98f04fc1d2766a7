import { afterEach, describe, expect, it, vi } from 'vitest'

import { ImapMailbox } from '../src/channels/ImapMailbox'
import { ConfigImap } from '../src/interface/Config'
import { makeIdentity } from './fakes'

interface FakeServer {
    connectError?: Error
    searchError?: Error
    // thrown once each, by the next searches in turn
    searchFailures: Error[]
    usable: boolean
    connects: number
    closes: number
    uids: number[]
    messages: Map<string, string>
    seen: string[]
    searches: unknown[]
}

const server = vi.hoisted((): FakeServer => ({
    searchFailures: [],
    usable: true,
    connects: 0,
    closes: 0,
    uids: [],
    messages: new Map<string, string>(),
    seen: [],
    searches: []
}))

vi.mock('imapflow', () => ({
    ImapFlow: class {
        get usable() {
            return server.usable
        }
        on() {
            return this
        }
        async connect() {
            server.connects++
            if (server.connectError) throw server.connectError
        }
        async getMailboxLock() {
            return { release: () => undefined }
        }
        async search(query: unknown) {
            server.searches.push(query)
            if (server.searchError) throw server.searchError
            const failure = server.searchFailures.shift()
            if (failure) throw failure
            return server.uids
        }
        async fetchOne(uid: string) {
            const source = server.messages.get(uid)
            return source === undefined ? false : { source: Buffer.from(source) }
        }
        async messageFlagsAdd(uid: string) {
            server.seen.push(uid)
            return true
        }
        close() {
            server.closes++
            return undefined
        }
        async logout() {
            return undefined
        }
    }
}))

const cfg: ConfigImap = { enabled: true, host: 'imap.example.com', port: 993, secure: true, user: 'inbox@example.com', password: 'test-secret', mailbox: 'INBOX' }
const identity = makeIdentity(1)

function message(date: Date, body: string): string {
    return [
        'From: Shop <no-reply@example.com>',
        'To: user1@example.com',
        'Subject: Verify your new account',
        `Date: ${date.toUTCString()}`,
        'Content-Type: text/plain; charset=utf-8',
        '',
        body,
        ''
    ].join('\r\n')
}

describe('ImapMailbox', () => {
    afterEach(() => {
        vi.restoreAllMocks()
        server.connectError = undefined
        server.searchError = undefined
        server.searchFailures = []
        server.usable = true
        server.connects = 0
        server.closes = 0
        server.uids = []
        server.messages.clear()
        server.seen = []
        server.searches = []
    })

    it('returns the code of the newest matching message and marks it seen', async () => {
        const since = new Date()
        server.uids = [3, 7]
        server.messages.set('7', message(since, 'Your verification code is 314159.'))
        server.messages.set('3', message(since, 'Your verification code is 271828.'))
        const mailbox = new ImapMailbox(cfg)

        const result = await mailbox.poll(identity, since, new AbortController().signal)

        expect(result).toEqual({ status: 'code', code: '314159' })
        expect(server.seen).toEqual(['7'])
        expect(server.searches[0]).toMatchObject({ to: 'user1@example.com', seen: false })
        await mailbox.close()
    })

    it('skips messages sent before the signup', async () => {
        const since = new Date()
        server.uids = [5]
        server.messages.set('5', message(new Date(since.getTime() - 60 * 60 * 1000), 'Your verification code is 111111.'))

        const result = await new ImapMailbox(cfg).poll(identity, since, new AbortController().signal)

        expect(result).toEqual({ status: 'none' })
        expect(server.seen).toEqual([])
    })

    it('reports none when nothing matches', async () => {
        expect(await new ImapMailbox(cfg).poll(identity, new Date(), new AbortController().signal)).toEqual({ status: 'none' })
    })

    it('fails the channel when the connection is refused', async () => {
        server.connectError = new Error('Invalid credentials')

        expect(await new ImapMailbox(cfg).poll(identity, new Date(), new AbortController().signal))
            .toEqual({ status: 'failed', reason: 'IMAP connect failed: Invalid credentials' })
    })

    it('keeps polling when a search fails on a live connection', async () => {
        server.searchError = new Error('Command timed out')
        vi.spyOn(console, 'warn').mockImplementation(() => undefined)
        const mailbox = new ImapMailbox(cfg)

        expect(await mailbox.poll(identity, new Date(), new AbortController().signal)).toEqual({ status: 'none' })
        expect(await mailbox.poll(identity, new Date(), new AbortController().signal)).toEqual({ status: 'none' })
        expect(server.connects).toBe(1)
        expect(server.closes).toBe(0)
    })

    it('does not fail other workers when one search fails', async () => {
        const since = new Date()
        server.uids = [4]
        server.messages.set('4', message(since, 'Your verification code is 424242.'))
        vi.spyOn(console, 'warn').mockImplementation(() => undefined)
        const mailbox = new ImapMailbox(cfg)
        await mailbox.poll(makeIdentity(2), since, new AbortController().signal)
        server.seen = []
        server.searchFailures = [new Error('Command timed out')]

        const [first, second] = await Promise.all([
            mailbox.poll(makeIdentity(2), since, new AbortController().signal),
            mailbox.poll(identity, since, new AbortController().signal)
        ])

        expect(first).toEqual({ status: 'none' })
        expect(second).toEqual({ status: 'code', code: '424242' })
        expect(server.connects).toBe(1)
        expect(server.closes).toBe(0)
    })

    it('reconnects on the next poll after the server dropped the connection', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined)
        const mailbox = new ImapMailbox(cfg)
        server.searchFailures = [new Error('Connection not available')]
        server.usable = false

        expect(await mailbox.poll(identity, new Date(), new AbortController().signal)).toEqual({ status: 'none' })
        server.usable = true
        expect(await mailbox.poll(identity, new Date(), new AbortController().signal)).toEqual({ status: 'none' })
        expect(server.connects).toBe(2)
    })

    it('does not query after the poll was cancelled', async () => {
        const controller = new AbortController()
        controller.abort()

        expect(await new ImapMailbox(cfg).poll(identity, new Date(), controller.signal)).toEqual({ status: 'none' })
        expect(server.searches).toEqual([])
    })
})
